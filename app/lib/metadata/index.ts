import { StructuralError } from "../errors";
import type { FetcherConfig } from "../config";
import type { Manifest } from "../manifest";
import { NS, descendantPath, expectExactlyOne, childElements, withAttribute } from "../manifest/xml";
import type { DescriptionField, DescriptionLabel, MarcRecord } from "../types";
import { languageValue } from "./languages";
import { fieldsOf, joinName, mergeInstances, parseMarcRecord, requireSubfield, subfieldValues } from "./marc";

export type DescriptionSettings = Pick<
  FetcherConfig,
  "sourceTemplate" | "permission" | "imagePage" | "wikisource"
>;

export interface BibliographicInput {
  record: MarcRecord;
  languages: string[];
  objectId: string;
}

const AUTHOR_ROLES = new Set(["Author", "Librettist", "Composer"]);
const EDITOR_ROLES = new Set(["Editor", "Compiler"]);
const TRANSLATOR_ROLES = new Set(["Translator"]);
const ILLUSTRATOR_ROLES = new Set(["Illustrator"]);

function namesWithRole(record: MarcRecord, roles: Set<string>): string[] {
  const people = [...fieldsOf(record, "100"), ...fieldsOf(record, "700")];
  return people
    .filter((person) => subfieldValues(person, "e").some((role) => roles.has(role)))
    .map((person) => joinName(person));
}

/**
 * `{{<template>|<prefix>|<id>}}` from an object id such as `uuid/1234`.
 */
export function sourceLink(objectId: string, template: string): string {
  const parts = objectId.split("/");
  if (parts.length !== 2) {
    throw new StructuralError(`Unexpected OBJID format: ${objectId}`);
  }
  return `{{${template}|${parts[0]}|${parts[1]}}}`;
}

/**
 * Map catalog data to the ordered fields of a Commons `{{Book}}` template.
 */
export function buildDescriptionFields(
  input: BibliographicInput,
  settings: DescriptionSettings,
): DescriptionField[] {
  const { record } = input;
  const fields: DescriptionField[] = [];
  const add = (label: DescriptionLabel, value: string, markup = false) => {
    fields.push({ label, value, markup });
  };

  const authors = namesWithRole(record, AUTHOR_ROLES);
  const translators = namesWithRole(record, TRANSLATOR_ROLES);
  const editors = namesWithRole(record, EDITOR_ROLES);
  const illustrators = namesWithRole(record, ILLUSTRATOR_ROLES);

  if (authors.length > 0) add("Author", authors.join("; "));
  if (translators.length > 0) add("Translator", translators.join("; "));
  if (editors.length > 0) add("Editor", editors.join("; "));
  if (illustrators.length > 0) add("Illustrator", illustrators.join("; "));

  const titleField = mergeInstances(fieldsOf(record, "245"));
  add("Title", requireSubfield(titleField, "a", "245")[0]);
  const subtitle = subfieldValues(titleField, "b");
  if (subtitle.length > 0) add("Subtitle", subtitle[0]);

  const [series] = fieldsOf(record, "440");
  if (series) {
    add("Series title", requireSubfield(series, "a", "440").join(", "));
  }

  const volume = [...subfieldValues(titleField, "n"), ...subfieldValues(titleField, "p")];
  if (volume.length > 0) add("Volume", volume.join(": "));

  const [publication] = fieldsOf(record, "260");
  if (publication) {
    const publisher = subfieldValues(publication, "b");
    const printer = subfieldValues(publication, "f");
    const date = subfieldValues(publication, "c");
    const city = subfieldValues(publication, "a");
    if (publisher.length > 0) add("Publisher", publisher[0]);
    if (printer.length > 0) add("Printer", printer[0]);
    if (date.length > 0) add("Date", date[0]);
    if (city.length > 0) add("City", city[0]);
  }

  const language = languageValue(input.languages);
  if (language !== null) add("Language", language, true);

  const [summary] = fieldsOf(record, "520");
  if (summary) add("Description", requireSubfield(summary, "a", "520")[0]);

  add("Source", sourceLink(input.objectId, settings.sourceTemplate), true);
  add("Permission", settings.permission, true);
  add("Image page", settings.imagePage, true);
  add("Wikisource", settings.wikisource, true);

  return fields;
}

/**
 * Pull the MARC record and Dublin Core languages out of the manifest's
 * descriptive metadata sections.
 */
export function readBibliographicInput(manifest: Manifest): BibliographicInput {
  const dmdSection = (id: string) => [
    { ns: NS.mets, local: "dmdSec", where: withAttribute("ID", id) },
    { ns: NS.mets, local: "mdWrap" },
    { ns: NS.mets, local: "xmlData" },
  ];

  const marcRecord = expectExactlyOne(
    descendantPath(manifest.root, [
      ...dmdSection("DMD_MARC"),
      { ns: NS.marc, local: "collection" },
      { ns: NS.marc, local: "record" },
    ]),
    "/mets:mets/mets:dmdSec[@ID='DMD_MARC']/mets:mdWrap/mets:xmlData/marc:collection/marc:record",
  );
  const dublinCore = expectExactlyOne(
    descendantPath(manifest.root, [...dmdSection("DMD_DC"), { ns: NS.oaiDc, local: "dc" }]),
    "/mets:mets/mets:dmdSec[@ID='DMD_DC']/mets:mdWrap/mets:xmlData/oai_dc:dc",
  );

  return {
    record: parseMarcRecord(marcRecord),
    languages: childElements(dublinCore, NS.dc, "language").map((el) => el.text),
    objectId: manifest.objectId,
  };
}

export function describeManifest(
  manifest: Manifest,
  settings: DescriptionSettings,
): DescriptionField[] {
  return buildDescriptionFields(readBibliographicInput(manifest), settings);
}

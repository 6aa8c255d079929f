/**
 * Namespace-aware element tree on top of xml2js.
 *
 * xml2js is run with `xmlns` and ordered children so that every node reports
 * its namespace URI and local name, and children keep document order. The
 * raw output is converted once into `XmlElement` so the rest of the code
 * never touches the loosely typed parser objects.
 */

import { parseStringPromise } from "xml2js";
import { StructuralError } from "../errors";

export const NS = {
  mets: "http://www.loc.gov/METS/",
  marc: "http://www.loc.gov/MARC21/slim",
  dc: "http://purl.org/dc/elements/1.1/",
  oaiDc: "http://www.openarchives.org/OAI/2.0/oai_dc/",
  xlink: "http://www.w3.org/1999/xlink",
} as const;

export interface XmlAttribute {
  uri: string;
  local: string;
  value: string;
}

export interface XmlElement {
  name: string;
  uri: string;
  local: string;
  attributes: XmlAttribute[];
  children: XmlElement[];
  text: string;
}

export type ElementPredicate = (el: XmlElement) => boolean;

export interface PathStep {
  ns: string;
  local: string;
  where?: ElementPredicate;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toAttributes(raw: unknown): XmlAttribute[] {
  if (!isRecord(raw)) return [];
  const attributes: XmlAttribute[] = [];
  for (const attr of Object.values(raw)) {
    if (!isRecord(attr)) continue;
    attributes.push({
      uri: readString(attr.uri),
      local: readString(attr.local),
      value: readString(attr.value),
    });
  }
  return attributes;
}

function toElement(name: string, raw: unknown): XmlElement {
  // Text-only nodes can collapse to a bare string
  if (!isRecord(raw)) {
    const colon = name.indexOf(":");
    return {
      name,
      uri: "",
      local: colon === -1 ? name : name.slice(colon + 1),
      attributes: [],
      children: [],
      text: readString(raw),
    };
  }

  const ns = isRecord(raw.$ns) ? raw.$ns : {};
  const children: XmlElement[] = [];
  if (Array.isArray(raw.$$)) {
    for (const child of raw.$$) {
      const childName = isRecord(child) ? readString(child["#name"]) : "";
      // Skip text and comment entries
      if (!childName || childName.startsWith("__")) continue;
      children.push(toElement(childName, child));
    }
  }

  return {
    name,
    uri: readString(ns.uri),
    local: readString(ns.local) || name,
    attributes: toAttributes(raw.$),
    children,
    text: readString(raw._),
  };
}

export async function parseXml(source: string): Promise<XmlElement> {
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(source, {
      xmlns: true,
      explicitChildren: true,
      preserveChildrenOrder: true,
      explicitArray: true,
    });
  } catch (error) {
    throw new StructuralError(
      `Invalid XML: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!isRecord(parsed)) {
    throw new StructuralError("Invalid XML: document has no root element");
  }
  const entries = Object.entries(parsed);
  if (entries.length !== 1) {
    throw new StructuralError("Invalid XML: document has no root element");
  }
  const [rootName, rootNode] = entries[0];
  return toElement(rootName, rootNode);
}

/**
 * Require a query to match exactly one node.
 */
export function expectExactlyOne<T>(items: readonly T[], query: string): T {
  if (items.length !== 1) {
    throw new StructuralError(
      `Query ${query} returned unexpected number of results: ${items.length}`,
    );
  }
  return items[0];
}

export function isElement(el: XmlElement, ns: string, local: string): boolean {
  return el.uri === ns && el.local === local;
}

export function childElements(
  el: XmlElement,
  ns: string,
  local: string,
  where?: ElementPredicate,
): XmlElement[] {
  return el.children.filter(
    (child) => isElement(child, ns, local) && (!where || where(child)),
  );
}

/**
 * Walk a path of child steps from `el`, collecting every match in
 * document order.
 */
export function descendantPath(el: XmlElement, steps: readonly PathStep[]): XmlElement[] {
  let current = [el];
  for (const step of steps) {
    current = current.flatMap((node) => childElements(node, step.ns, step.local, step.where));
  }
  return current;
}

export function attribute(el: XmlElement, local: string, ns = ""): string | undefined {
  return el.attributes.find((attr) => attr.local === local && attr.uri === ns)?.value;
}

export function requireAttribute(el: XmlElement, local: string, ns = ""): string {
  const value = attribute(el, local, ns);
  if (value === undefined) {
    throw new StructuralError(`Element ${el.name} is missing attribute ${local}`);
  }
  return value;
}

/** Predicate matching an unqualified attribute value. */
export function withAttribute(local: string, value: string): ElementPredicate {
  return (el) => attribute(el, local) === value;
}

export function allOf(...predicates: ElementPredicate[]): ElementPredicate {
  return (el) => predicates.every((predicate) => predicate(el));
}

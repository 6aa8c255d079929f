/**
 * MARC21 slim record helpers.
 */

import { StructuralError } from "../errors";
import { NS, childElements, requireAttribute, type XmlElement } from "../manifest/xml";
import type { MarcField, MarcRecord } from "../types";

/**
 * Collect every `marc:datafield` of a record as tag -> field instances,
 * each instance mapping subfield code -> values. Document order is kept at
 * both levels.
 */
export function parseMarcRecord(record: XmlElement): MarcRecord {
  const result: MarcRecord = new Map();

  for (const datafield of childElements(record, NS.marc, "datafield")) {
    const tag = requireAttribute(datafield, "tag");
    const field: MarcField = new Map();

    for (const subfield of childElements(datafield, NS.marc, "subfield")) {
      const code = requireAttribute(subfield, "code");
      const values = field.get(code);
      if (values) {
        values.push(subfield.text);
      } else {
        field.set(code, [subfield.text]);
      }
    }

    const instances = result.get(tag);
    if (instances) {
      instances.push(field);
    } else {
      result.set(tag, [field]);
    }
  }

  return result;
}

export function fieldsOf(record: MarcRecord, tag: string): MarcField[] {
  return record.get(tag) ?? [];
}

export function subfieldValues(field: MarcField, code: string): string[] {
  return field.get(code) ?? [];
}

export function requireSubfield(field: MarcField, code: string, tag: string): string[] {
  const values = field.get(code);
  if (!values || values.length === 0) {
    throw new StructuralError(`MARC field ${tag} has no subfield ${code}`);
  }
  return values;
}

/**
 * Personal name from subfields a (name), b (numeration) and c (titles).
 */
export function joinName(field: MarcField, tag = "100/700"): string {
  return [
    ...requireSubfield(field, "a", tag),
    ...subfieldValues(field, "b"),
    ...subfieldValues(field, "c"),
  ].join(" ");
}

/**
 * Merge all instances of a tag subfield-wise; a later instance replaces
 * the values of a code it repeats.
 */
export function mergeInstances(fields: MarcField[]): MarcField {
  const merged: MarcField = new Map();
  for (const field of fields) {
    for (const [code, values] of field) {
      merged.set(code, values);
    }
  }
  return merged;
}

import type { DescriptionField } from "../types";

/**
 * Neutralize template syntax in text copied from the catalog record so a
 * stray pipe or brace pair cannot split or close the `{{Book}}` call.
 */
export function escapeTemplateValue(value: string): string {
  return value
    .replace(/\{\{/g, "&#123;&#123;")
    .replace(/\}\}/g, "&#125;&#125;")
    .replace(/\|/g, "{{!}}");
}

export function renderBookTemplate(fields: readonly DescriptionField[]): string {
  const lines = fields.map(
    (field) =>
      ` |${field.label} = ${field.markup ? field.value : escapeTemplateValue(field.value)}`,
  );
  return ["{{Book", ...lines].join("\n") + "\n}}";
}

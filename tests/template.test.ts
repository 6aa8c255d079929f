import { describe, it, expect } from "vitest";
import { escapeTemplateValue, renderBookTemplate } from "../app/lib/metadata/template";

describe("renderBookTemplate", () => {
  it("should render one line per field between the template markers", () => {
    const text = renderBookTemplate([
      { label: "Author", value: "Svoboda, Karel", markup: false },
      { label: "Title", value: "Sample Title", markup: false },
      { label: "Permission", value: "{{PD-old}}", markup: true },
    ]);

    expect(text).toBe(
      "{{Book\n |Author = Svoboda, Karel\n |Title = Sample Title\n |Permission = {{PD-old}}\n}}",
    );
  });

  it("should render an empty field list as a bare template", () => {
    expect(renderBookTemplate([])).toBe("{{Book\n}}");
  });

  it("should escape template syntax in record text only", () => {
    const text = renderBookTemplate([
      { label: "Title", value: "A | B {{x}}", markup: false },
      { label: "Language", value: "{{language|cs}}, {{language|en}}", markup: true },
    ]);

    expect(text.split("\n")).toEqual([
      "{{Book",
      " |Title = A {{!}} B &#123;&#123;x&#125;&#125;",
      " |Language = {{language|cs}}, {{language|en}}",
      "}}",
    ]);
  });
});

describe("escapeTemplateValue", () => {
  it("should leave ordinary text alone", () => {
    expect(escapeTemplateValue("Praha : Example Press, 1901.")).toBe(
      "Praha : Example Press, 1901.",
    );
  });

  it("should not re-escape the pipe replacement", () => {
    expect(escapeTemplateValue("a|b")).toBe("a{{!}}b");
  });
});

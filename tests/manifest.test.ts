import { describe, it, expect, vi } from "vitest";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { extractPages, loadManifest, parseManifest, readFileGroup } from "../app/lib/manifest";
import {
  NS,
  attribute,
  childElements,
  expectExactlyOne,
  parseXml,
} from "../app/lib/manifest/xml";
import { StructuralError } from "../app/lib/errors";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string) => join(__dirname, "fixtures", name);

const METS_OPEN = `<mets:mets xmlns:mets="${NS.mets}" xmlns:xlink="${NS.xlink}" OBJID="a/b">`;

describe("xml", () => {
  it("should resolve namespaces independently of prefixes", async () => {
    const root = await parseXml(
      `<m:mets xmlns:m="${NS.mets}" OBJID="x/1"><m:fileSec/><other xmlns="urn:other"/></m:mets>`,
    );

    expect(root.uri).toBe(NS.mets);
    expect(root.local).toBe("mets");
    expect(attribute(root, "OBJID")).toBe("x/1");
    expect(childElements(root, NS.mets, "fileSec")).toHaveLength(1);
    expect(childElements(root, NS.mets, "other")).toHaveLength(0);
  });

  it("should keep children in document order across element names", async () => {
    const root = await parseXml(
      `<r xmlns="${NS.mets}"><div ORDER="1"/><fptr/><div ORDER="2"/><div ORDER="3"/></r>`,
    );

    const orders = childElements(root, NS.mets, "div").map((el) => attribute(el, "ORDER"));
    expect(orders).toEqual(["1", "2", "3"]);
    expect(root.children.map((el) => el.local)).toEqual(["div", "fptr", "div", "div"]);
  });

  it("should read element text", async () => {
    const root = await parseXml(`<r xmlns:dc="${NS.dc}"><dc:language>cze</dc:language></r>`);
    const [language] = childElements(root, NS.dc, "language");
    expect(language.text).toBe("cze");
  });

  it("should reject malformed XML as a structural error", async () => {
    await expect(parseXml("<mets:mets")).rejects.toBeInstanceOf(StructuralError);
  });

  it("expectExactlyOne should report the query and count", () => {
    expect(expectExactlyOne(["only"], "q")).toBe("only");
    expect(() => expectExactlyOne([], "/a/b")).toThrow(
      "Query /a/b returned unexpected number of results: 0",
    );
    expect(() => expectExactlyOne([1, 2], "/a/b")).toThrow(
      "Query /a/b returned unexpected number of results: 2",
    );
  });
});

describe("manifest", () => {
  it("should read the object identifier", async () => {
    const manifest = await loadManifest(fixture("book.xml"));
    expect(manifest.objectId).toBe("uuid:test-book/1001");
  });

  it("should reject a document that is not METS", async () => {
    await expect(parseManifest(`<root/>`)).rejects.toThrow(
      "Query /mets:mets returned unexpected number of results: 0",
    );
  });

  describe("readFileGroup", () => {
    it("should keep only page files of the requested MIME type, in group order", async () => {
      const manifest = await loadManifest(fixture("book.xml"));
      const images = readFileGroup(manifest, "img", "image/vnd.djvu");

      expect([...images]).toEqual([
        ["IMG_0003", "http://library.test/img/3"],
        ["IMG_0001", "http://library.test/img/1"],
        ["IMG_0002", "http://library.test/img/2"],
      ]);
    });

    it("should require exactly one URL location per file", async () => {
      const manifest = await parseManifest(`${METS_OPEN}
        <mets:fileSec>
          <mets:fileGrp USE="img">
            <mets:file ID="P1" USE="Page" MIMETYPE="image/vnd.djvu">
              <mets:FLocat LOCTYPE="URL" xlink:href="http://library.test/1"/>
              <mets:FLocat LOCTYPE="URL" xlink:href="http://library.test/1b"/>
            </mets:file>
          </mets:fileGrp>
        </mets:fileSec>
      </mets:mets>`);

      expect(() => readFileGroup(manifest, "img", "image/vnd.djvu")).toThrow(
        "Query mets:file[@ID='P1']/mets:FLocat[@LOCTYPE='URL'] returned unexpected number of results: 2",
      );
    });

    it("should require the group to exist", async () => {
      const manifest = await parseManifest(`${METS_OPEN}<mets:fileSec/></mets:mets>`);
      expect(() => readFileGroup(manifest, "txt", "text/plain")).toThrow(StructuralError);
    });
  });

  describe("extractPages", () => {
    it("should pair images and texts in page structure order", async () => {
      const manifest = await loadManifest(fixture("book.xml"));
      const extraction = extractPages(manifest);

      expect(extraction).toEqual({
        status: "pages",
        ordering: "structure",
        pages: [
          {
            order: "1",
            image: { id: "IMG_0001", url: "http://library.test/img/1" },
            text: { id: "TXT_0001", url: "http://library.test/txt/1" },
          },
          {
            order: "2",
            image: { id: "IMG_0002", url: "http://library.test/img/2" },
            text: { id: "TXT_0002", url: "http://library.test/txt/2" },
          },
          {
            order: "3",
            image: { id: "IMG_0003", url: "http://library.test/img/3" },
            text: null,
          },
        ],
      });
    });

    it("should signal an empty image group without throwing", async () => {
      const manifest = await loadManifest(fixture("no-pages.xml"));
      expect(extractPages(manifest)).toEqual({ status: "empty" });
    });

    it("should name the page order when a page has no image", async () => {
      const file = fixture("missing-image.xml");
      const manifest = await loadManifest(file);

      expect(() => extractPages(manifest)).toThrow(`${file}: No image URL for page 2`);
    });

    it("should fall back to image group order without a structure map", async () => {
      const manifest = await loadManifest(fixture("no-structmap.xml"));
      const onWarning = vi.fn();
      const extraction = extractPages(manifest, { onWarning });

      expect(extraction.status).toBe("pages");
      if (extraction.status !== "pages") return;
      expect(extraction.ordering).toBe("group");
      expect(extraction.pages.map((page) => page.image.id)).toEqual([
        "IMG_0003",
        "IMG_0001",
        "IMG_0002",
      ]);
      expect(extraction.pages.every((page) => page.text === null)).toBe(true);
      expect(onWarning).toHaveBeenCalledTimes(1);
    });

    it("should reject a missing structure map when one is required", async () => {
      const manifest = await loadManifest(fixture("no-structmap.xml"));
      expect(() => extractPages(manifest, { requireStructMap: true })).toThrow(
        StructuralError,
      );
    });
  });
});

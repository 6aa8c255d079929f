import { readFile } from "fs/promises";
import { StructuralError } from "../errors";
import type { PageEntry, PageExtraction, ResourceLocator } from "../types";
import {
  NS,
  allOf,
  attribute,
  childElements,
  descendantPath,
  expectExactlyOne,
  parseXml,
  requireAttribute,
  withAttribute,
  type XmlElement,
} from "./xml";

export const IMAGE_GROUP = { use: "img", mimeType: "image/vnd.djvu" } as const;
export const TEXT_GROUP = { use: "txt", mimeType: "text/plain" } as const;

export interface Manifest {
  /** Source path, used in error messages */
  source: string;
  root: XmlElement;
  objectId: string;
}

export interface ExtractPagesOptions {
  requireStructMap?: boolean;
  onWarning?: (message: string) => void;
}

export async function parseManifest(xml: string, source = "<manifest>"): Promise<Manifest> {
  const root = await parseXml(xml);
  const mets = expectExactlyOne(
    [root].filter((el) => el.uri === NS.mets && el.local === "mets"),
    "/mets:mets",
  );
  return { source, root: mets, objectId: requireAttribute(mets, "OBJID") };
}

export async function loadManifest(filePath: string): Promise<Manifest> {
  const xml = await readFile(filePath, "utf-8");
  return parseManifest(xml, filePath);
}

/**
 * Read the page files of one `mets:fileGrp` as an ordered id -> URL map.
 * Only `USE="Page"` files with exactly the given MIME type are taken.
 */
export function readFileGroup(
  manifest: Manifest,
  use: string,
  mimeType: string,
): Map<string, string> {
  const group = expectExactlyOne(
    descendantPath(manifest.root, [
      { ns: NS.mets, local: "fileSec" },
      { ns: NS.mets, local: "fileGrp", where: withAttribute("USE", use) },
    ]),
    `/mets:mets/mets:fileSec/mets:fileGrp[@USE='${use}']`,
  );

  const files = childElements(
    group,
    NS.mets,
    "file",
    allOf(withAttribute("USE", "Page"), withAttribute("MIMETYPE", mimeType)),
  );

  const urls = new Map<string, string>();
  for (const file of files) {
    const id = requireAttribute(file, "ID");
    const location = expectExactlyOne(
      childElements(file, NS.mets, "FLocat", withAttribute("LOCTYPE", "URL")),
      `mets:file[@ID='${id}']/mets:FLocat[@LOCTYPE='URL']`,
    );
    urls.set(id, requireAttribute(location, "href", NS.xlink));
  }
  return urls;
}

function findPageStructure(manifest: Manifest): XmlElement | null {
  const candidates = descendantPath(manifest.root, [
    { ns: NS.mets, local: "structMap", where: withAttribute("TYPE", "Pages") },
    { ns: NS.mets, local: "div", where: withAttribute("TYPE", "Pages") },
  ]);
  if (candidates.length === 0) return null;
  return expectExactlyOne(
    candidates,
    "/mets:mets/mets:structMap[@TYPE='Pages']/mets:div[@TYPE='Pages']",
  );
}

function toLocator(id: string, urls: Map<string, string>): ResourceLocator | null {
  const url = urls.get(id);
  return url === undefined ? null : { id, url };
}

/**
 * Pair image and text files page by page.
 *
 * The page structure map decides the order. Each page div points at its
 * files through `mets:fptr`; a pointer is checked against the image group
 * first, then the text group. Manifests without a page structure fall back
 * to image group order with no text.
 */
export function extractPages(
  manifest: Manifest,
  options: ExtractPagesOptions = {},
): PageExtraction {
  const images = readFileGroup(manifest, IMAGE_GROUP.use, IMAGE_GROUP.mimeType);
  const texts = readFileGroup(manifest, TEXT_GROUP.use, TEXT_GROUP.mimeType);

  if (images.size === 0) {
    return { status: "empty" };
  }

  const structure = findPageStructure(manifest);
  if (!structure) {
    if (options.requireStructMap) {
      throw new StructuralError(`${manifest.source}: No page structure map`);
    }
    options.onWarning?.(
      `${manifest.source}: No page structure map, using image group order without text`,
    );
    const pages: PageEntry[] = [...images].map(([id, url], index) => ({
      order: String(index + 1),
      image: { id, url },
      text: null,
    }));
    return { status: "pages", pages, ordering: "group" };
  }

  const pages: PageEntry[] = [];
  for (const node of childElements(structure, NS.mets, "div")) {
    const order = attribute(node, "ORDER") ?? "?";
    let image: ResourceLocator | null = null;
    let text: ResourceLocator | null = null;

    for (const pointer of childElements(node, NS.mets, "fptr")) {
      const fileId = requireAttribute(pointer, "FILEID");
      const imageLocator = toLocator(fileId, images);
      if (imageLocator) {
        image = imageLocator;
        continue;
      }
      text = toLocator(fileId, texts) ?? text;
    }

    // Text is optional, some books have none at all
    if (!image) {
      throw new StructuralError(`${manifest.source}: No image URL for page ${order}`);
    }
    pages.push({ order, image, text });
  }

  return { status: "pages", pages, ordering: "structure" };
}

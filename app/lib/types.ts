export interface ResourceLocator {
  id: string;
  url: string;
}

export interface PageEntry {
  order: string;
  image: ResourceLocator;
  text: ResourceLocator | null;
}

/** How the page sequence was derived from the manifest. */
export type PageOrdering = "structure" | "group";

export type PageExtraction =
  | { status: "empty" }
  | { status: "pages"; pages: PageEntry[]; ordering: PageOrdering };

/** Subfield code -> values, in document order. */
export type MarcField = Map<string, string[]>;

/** Tag -> field instances, in document order. */
export type MarcRecord = Map<string, MarcField[]>;

export type DescriptionLabel =
  | "Author"
  | "Translator"
  | "Editor"
  | "Illustrator"
  | "Title"
  | "Subtitle"
  | "Series title"
  | "Volume"
  | "Publisher"
  | "Printer"
  | "Date"
  | "City"
  | "Language"
  | "Description"
  | "Source"
  | "Permission"
  | "Image page"
  | "Wikisource";

export interface DescriptionField {
  label: DescriptionLabel;
  value: string;
  // Composed template markup, written without escaping
  markup: boolean;
}

export interface PageSize {
  width: number;
  height: number;
}

export interface AssemblyResult {
  outFile: string;
  pageFiles: string[];
  pageCount: number;
}

export type FileResult =
  | { file: string; status: "done"; outFile: string; description: string; pageCount: number }
  | { file: string; status: "skipped"; reason: string }
  | { file: string; status: "failed"; error: Error };

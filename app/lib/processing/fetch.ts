import { writeFile } from "fs/promises";
import { RetrievalError } from "../errors";

export type FetchLike = (url: string) => Promise<Response>;

async function get(url: string, fetchImpl: FetchLike): Promise<Response> {
  const response = await fetchImpl(url);
  if (!response.ok) {
    throw new RetrievalError(url, response.status, response.statusText);
  }
  return response;
}

/**
 * Download a binary resource into `filePath` and return its bytes.
 */
export async function downloadToFile(
  url: string,
  filePath: string,
  fetchImpl: FetchLike = fetch,
): Promise<Buffer> {
  const response = await get(url, fetchImpl);
  const buffer = Buffer.from(await response.arrayBuffer());
  await writeFile(filePath, buffer);
  return buffer;
}

/**
 * Fetch a text resource, decoding it with `charset` whatever the server
 * declares. Carriage returns are dropped.
 */
export async function downloadText(
  url: string,
  charset: string,
  fetchImpl: FetchLike = fetch,
): Promise<string> {
  const response = await get(url, fetchImpl);
  const bytes = await response.arrayBuffer();
  return new TextDecoder(charset).decode(bytes).replace(/\r/g, "");
}

import { vi } from "vitest";
import type { FetchLike } from "../app/lib/processing/fetch";
import type { ToolResult, ToolRunner } from "../app/lib/processing/tools";

/**
 * Minimal single-page DjVu file: an IFF FORM:DJVU holding only an INFO chunk.
 * `flags` carries the rotation in its low three bits (1 = upright).
 */
export function makeDjvuPage(width: number, height: number, flags = 1): Buffer {
  const info = Buffer.alloc(10);
  info.writeUInt16BE(width, 0);
  info.writeUInt16BE(height, 2);
  info.writeUInt8(26, 4); // minor version
  info.writeUInt8(0, 5); // major version
  info.writeUInt16LE(300, 6); // dpi
  info.writeUInt8(22, 8); // gamma
  info.writeUInt8(flags, 9);

  const chunkHeader = Buffer.alloc(8);
  chunkHeader.write("INFO", 0, "latin1");
  chunkHeader.writeUInt32BE(info.length, 4);

  const formSize = Buffer.alloc(4);
  formSize.writeUInt32BE(4 + chunkHeader.length + info.length, 0);

  return Buffer.concat([
    Buffer.from("AT&TFORM", "latin1"),
    formSize,
    Buffer.from("DJVU", "latin1"),
    chunkHeader,
    info,
  ]);
}

export type FakeResource = Buffer | string | { status: number; statusText: string };

/**
 * In-process stand-in for `fetch` serving a fixed set of URLs.
 */
export function fakeFetch(resources: Record<string, FakeResource>) {
  return vi.fn<FetchLike>(async (url) => {
    const resource = resources[url];
    if (resource === undefined) {
      return new Response("not found", { status: 404, statusText: "Not Found" });
    }
    if (typeof resource === "string") {
      return new Response(resource);
    }
    if (Buffer.isBuffer(resource)) {
      return new Response(new Uint8Array(resource));
    }
    return new Response("error", resource);
  });
}

export function fakeToolRunner(exitCodes: Record<string, number> = {}) {
  return vi.fn<ToolRunner>(
    async (command): Promise<ToolResult> => ({
      exitCode: exitCodes[command] ?? 0,
      stderr: exitCodes[command] ? `${command} failed` : "",
    }),
  );
}

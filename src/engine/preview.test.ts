import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fsp from "node:fs/promises";
import path from "node:path";
import { LocalStorage } from "../storage/local.js";
import { charBoundary, PreviewReader } from "./preview.js";
import { AppError } from "./errors.js";
import { makeTempDir, removeDir } from "../testing/multipart.js";

const TOKEN = "6d1c2b3a-4e5f-4a6b-8c7d-9e0f1a2b3c4d";

function hasCode(code: string) {
  return (err: unknown) => err instanceof AppError && err.code === code;
}

describe("PreviewReader", () => {
  let dir: string;
  let reader: PreviewReader;

  beforeEach(async () => {
    dir = await makeTempDir();
    reader = new PreviewReader(new LocalStorage(dir), 10240);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function put(name: string, content: string | Buffer): Promise<string> {
    const id = `${TOKEN}_${name}`;
    await fsp.writeFile(path.join(dir, id), content);
    return id;
  }

  it("returns a small text file verbatim", async () => {
    const body = "line\n".repeat(1000);
    const id = await put("small.txt", body);

    const preview = await reader.preview(id);

    assert.equal(Buffer.byteLength(body), 5000);
    assert.deepEqual(preview, { content: body, type: "text", filename: "small.txt" });
  });

  it("truncates a large file to the limit and names it in the marker", async () => {
    const id = await put("big.log", "a".repeat(20000));

    const { content } = await reader.preview(id);

    assert.equal(content, "a".repeat(10240) + "...\n\n[Content truncated - showing first 10KB of big.log]");
  });

  it("does not truncate a file of exactly the limit", async () => {
    const id = await put("exact.md", "b".repeat(10240));
    const { content } = await reader.preview(id);
    assert.equal(content, "b".repeat(10240));
  });

  it("previews code files", async () => {
    const id = await put("main.rs", "fn main() {}\n");
    assert.deepEqual(await reader.preview(id), { content: "fn main() {}\n", type: "code", filename: "main.rs" });
  });

  it("refuses non-text categories without reading", async () => {
    const id = await put("bundle.zip", "plain text inside");
    await assert.rejects(reader.preview(id), hasCode("NOT_PREVIEWABLE"));
    await assert.rejects(reader.preview(`${TOKEN}_photo.png`), hasCode("NOT_PREVIEWABLE"));
    await assert.rejects(reader.preview(`${TOKEN}_missing.zip`), hasCode("NOT_PREVIEWABLE"));
  });

  it("reports a missing text file as not found", async () => {
    await assert.rejects(reader.preview(`${TOKEN}_missing.txt`), hasCode("NOT_FOUND"));
    await assert.rejects(reader.preview("../escape.txt"), hasCode("NOT_FOUND"));
  });

  it("fails with READ_ERROR on invalid UTF-8", async () => {
    const id = await put("binary.txt", Buffer.from([0x68, 0x69, 0xff, 0xfe, 0x00]));
    await assert.rejects(reader.preview(id), hasCode("READ_ERROR"));
  });

  it("does not split a multi-byte character at the cut", async () => {
    const small = new PreviewReader(new LocalStorage(dir), 1024);
    const id = await put("multi.md", "a".repeat(1023) + "é" + "zz");

    const { content } = await small.preview(id);

    assert.equal(content, "a".repeat(1023) + "...\n\n[Content truncated - showing first 1KB of multi.md]");
  });
});

describe("charBoundary", () => {
  it("backs off from continuation bytes", () => {
    const data = Buffer.from("ab€c"); // € is three bytes
    assert.equal(charBoundary(data, 2), 2);
    assert.equal(charBoundary(data, 3), 2);
    assert.equal(charBoundary(data, 4), 2);
    assert.equal(charBoundary(data, 5), 5);
  });

  it("never exceeds the data length", () => {
    assert.equal(charBoundary(Buffer.from("abc"), 10), 3);
  });
});

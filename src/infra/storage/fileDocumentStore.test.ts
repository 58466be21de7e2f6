import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileDocumentStore } from "./fileDocumentStore";

describe("FileDocumentStore", () => {
  let root = "";

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "archive-store-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes bytes verbatim and creates parent directories", async () => {
    const store = new FileDocumentStore(root);
    const body = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x00, 0xff]);

    const saved = await store.save("TCS/TCS_Q1-FY2024_transcript.pdf", body);

    expect(saved.isOk()).toBe(true);
    if (saved.isErr()) {
      throw new Error(saved.error.message);
    }

    expect(saved.value).toBe(path.join(root, "TCS", "TCS_Q1-FY2024_transcript.pdf"));
    expect(new Uint8Array(await readFile(saved.value))).toEqual(body);
  });

  it("overwrites an existing file", async () => {
    const store = new FileDocumentStore(root);

    await store.save("INFY/a.pdf", new TextEncoder().encode("first"));
    const saved = await store.save("INFY/a.pdf", new TextEncoder().encode("second"));

    expect(saved.isOk()).toBe(true);
    expect(await readFile(path.join(root, "INFY", "a.pdf"), "utf8")).toBe("second");
  });

  it("refuses paths that escape the archive root", async () => {
    const store = new FileDocumentStore(root);

    const saved = await store.save("../outside.pdf", new Uint8Array([1]));

    expect(saved.isErr()).toBe(true);
    expect(saved.isErr() && saved.error.code).toBe("validation_error");
    expect(saved.isErr() && saved.error.source).toBe("storage");
  });

  it("maps filesystem failures to io errors", async () => {
    const store = new FileDocumentStore(root);
    await store.save("TCS", new Uint8Array([1]));

    // "TCS" is now a file, so it cannot become a directory.
    const saved = await store.save("TCS/report.pdf", new Uint8Array([1]));

    expect(saved.isErr()).toBe(true);
    expect(saved.isErr() && saved.error.code).toBe("io_error");
    expect(saved.isErr() && saved.error.provider).toBe("file-store");
  });

  it("lists the files of one company directory by name", async () => {
    const store = new FileDocumentStore(root);
    await store.save("TCS/b.pdf", new Uint8Array([1, 2, 3]));
    await store.save("TCS/a.pdf", new Uint8Array([1]));
    await store.save("TCS/drafts/c.pdf", new Uint8Array([1]));

    const listed = await store.list("TCS");

    expect(listed.isOk()).toBe(true);
    if (listed.isErr()) {
      throw new Error(listed.error.message);
    }
    expect(listed.value.map((file) => [file.name, file.sizeBytes])).toEqual([
      ["a.pdf", 1],
      ["b.pdf", 3],
    ]);
  });

  it("lists a company that was never archived as empty", async () => {
    const listed = await new FileDocumentStore(root).list("NONE");

    expect(listed.isOk() && listed.value).toEqual([]);
  });

  it("clears the files of one company directory", async () => {
    const store = new FileDocumentStore(root);
    await store.save("TCS/a.pdf", new Uint8Array([1]));
    await store.save("TCS/b.pdf", new Uint8Array([1]));
    await store.save("TCS/drafts/c.pdf", new Uint8Array([1]));
    await store.save("INFY/a.pdf", new Uint8Array([1]));

    const cleared = await store.clear("TCS");

    expect(cleared.isOk() && cleared.value).toBe(2);
    expect(await readdir(path.join(root, "TCS"))).toEqual(["drafts"]);
    expect(await readdir(path.join(root, "INFY"))).toEqual(["a.pdf"]);
  });

  it("refuses to list or clear outside the archive root", async () => {
    const store = new FileDocumentStore(root);

    const listed = await store.list("..");
    const cleared = await store.clear("../elsewhere");

    expect(listed.isErr() && listed.error.code).toBe("validation_error");
    expect(cleared.isErr() && cleared.error.code).toBe("validation_error");
  });
});

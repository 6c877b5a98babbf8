import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { hashData } from "@hashtree/digest";
import { run } from "../src/cli/hashtree.js";

const R1 = "b54e0de66895b3d3bab28029da3e18ac038ca0968b77fc5e56d4c28bfa9a2eaf";
const R2 = "d15dbd423399f9a8ccb1f07ebc95af2d04af86d7d169e7ed5d158ceba246e7ce";

let dir: string;
let out: string[];
let err: string[];

function cli(...args: string[]): number {
  return run(["node", "hashtree", ...args]);
}

function writeFixture(name: string, body: unknown): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, typeof body === "string" ? body : JSON.stringify(body), "utf8");
  return file;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "hashtree-cli-"));
  out = [];
  err = [];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    out.push(String(chunk));
    return true;
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    err.push(args.map(String).join(" "));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("hashtree cli", () => {
  it("prints usage with no arguments", () => {
    expect(cli()).toBe(0);
    expect(out.join("")).toContain("hashtree root <leaves.json>");
  });

  it("root over raw values", () => {
    const file = writeFixture("leaves.json", ["data1", "data2", "data3", "data4"]);
    expect(cli("root", file)).toBe(0);
    expect(out).toEqual([`root: ${R1}\n`, "leaves: 4\n"]);
  });

  it("root --json over prehashed leaves in an envelope", () => {
    const leaves = ["data1", "data2", "data3", "data4"].map((v) => hashData(v));
    const file = writeFixture("digests.json", { leaves, algorithm: "sha256" });
    expect(cli("root", file, "--digests", "--json")).toBe(0);
    expect(JSON.parse(out.join(""))).toEqual({ ok: true, algorithm: "sha256", leaf_count: 4, root: R1 });
  });

  it("root of an empty leaves file fails with EMPTY_TREE", () => {
    const file = writeFixture("empty.json", []);
    expect(cli("root", file)).toBe(1);
    expect(err).toEqual(["[hashtree] Merkle tree is empty (no root)."]);

    out = [];
    expect(cli("root", file, "--json")).toBe(1);
    expect(JSON.parse(out.join(""))).toEqual({
      ok: false,
      code: "EMPTY_TREE",
      message: "Merkle tree is empty (no root).",
    });
  });

  it("layers prints one line per layer", () => {
    const file = writeFixture("abc.json", ["a", "b", "c"]);
    expect(cli("layers", file)).toBe(0);
    expect(out).toEqual([
      "layer 0: ac8d8342bbb2362d13f0a559a3621bb407011368895164b628a54f7fc33fc43c c100f95c1913f9c72fc1f4ef0847e1e723ffe0bde0b36e5f36c13f81fe8c26ed 879923da020d1533f4d8e921ea7bac61e8ba41d3c89d17a4d14e3a89c6780d5d\n",
      "layer 1: 45b86a6d93c00f23977db51b6acae905efc1027a054b699f6452ef0eb86f9cf7 9b3fcdf0378dd4c34cbbc1b70de85b0590ffc9cbe14ac3724a2528db9003b8eb\n",
      "layer 2: ab2a9aa202d5de098173c852a81d49a625bee64279d3c34788f098518beaf360\n",
    ]);
  });

  it("update prints old and new root", () => {
    const file = writeFixture("leaves.json", ["data1", "data2", "data3", "data4"]);
    expect(cli("update", file, "--index", "0", "--value", "new_data1")).toBe(0);
    expect(out).toEqual([`leaf[0]: ${hashData("new_data1")}\n`, `old_root: ${R1}\n`, `new_root: ${R2}\n`]);
  });

  it("update --digests takes a digest value", () => {
    const leaves = ["data1", "data2", "data3", "data4"].map((v) => hashData(v));
    const file = writeFixture("digests.json", leaves);
    expect(cli("update", file, "--digests", "--index", "0", "--value", hashData("new_data1"), "--json")).toBe(0);
    expect(JSON.parse(out.join(""))).toEqual({
      ok: true,
      index: 0,
      leaf: hashData("new_data1"),
      old_root: R1,
      new_root: R2,
    });
  });

  it("update rejects out-of-bounds indexes", () => {
    const file = writeFixture("leaves.json", ["data1", "data2", "data3", "data4"]);
    expect(cli("update", file, "--index", "4", "--value", "x")).toBe(1);
    expect(err).toEqual(["[hashtree] Leaf index 4 is out of bounds (leaf count 4)."]);
    expect(out).toEqual([]);
  });

  it("update requires an integer --index", () => {
    const file = writeFixture("leaves.json", ["data1"]);
    expect(cli("update", file, "--index", "one", "--value", "x")).toBe(1);
    expect(err).toEqual(["[hashtree] --index must be an integer, got: one"]);
  });

  it("verify accepts the matching root and rejects another", () => {
    const file = writeFixture("leaves.json", ["data1", "data2", "data3", "data4"]);
    expect(cli("verify", file, "--expect", R1)).toBe(0);
    expect(out).toEqual(["ok: true\n", `expected_root: ${R1}\n`, `computed_root: ${R1}\n`]);

    out = [];
    expect(cli("verify", file, "--expect", R2)).toBe(1);
    expect(out).toEqual(["ok: false\n", `expected_root: ${R2}\n`, `computed_root: ${R1}\n`]);
    expect(err).toEqual([
      "[hashtree] ROOT_HASH_MISMATCH: Merkle root mismatch (data differs from the recorded root).",
    ]);
  });

  it("hash prints the digest of a JSON value or plain string", () => {
    expect(cli("hash", "data1")).toBe(0);
    expect(cli("hash", '{"b":1,"a":[1,"x"]}')).toBe(0);
    expect(out).toEqual([
      "a065377cdd0d8afe32e741acd0cff2a1d125514d00d5227dbc9da7f735c901f1\n",
      "a88dede55f330dbae7d6c99cb78c43213f114625ed11c8fd0b769d117c06bb50\n",
    ]);
  });

  it("rejects an unknown --algo", () => {
    expect(cli("hash", "data1", "--algo", "md5")).toBe(1);
    expect(err).toEqual(["[hashtree] Unsupported digest algorithm: md5 (expected one of sha256, sha384, sha512)"]);
  });

  it("reports unreadable and malformed inputs", () => {
    expect(cli("root", path.join(dir, "missing.json"))).toBe(1);
    expect(err[0]).toBe(`[hashtree] file not found: ${path.join(dir, "missing.json")}`);

    err = [];
    const bad = writeFixture("bad.json", "{not json");
    expect(cli("root", bad)).toBe(1);
    expect(err).toEqual([`[hashtree] "${bad}" is not valid JSON. First 120 chars: {not json`]);

    err = [];
    const notDigests = writeFixture("plain.json", ["data1"]);
    expect(cli("root", notDigests, "--digests")).toBe(1);
    expect(err).toEqual([
      `[hashtree] "${notDigests}" has invalid leaf digests: 0: expected 64-char lowercase hex sha256 digest`,
    ]);
  });

  it("unknown commands print usage", () => {
    expect(cli("frobnicate")).toBe(1);
    expect(err[0]).toBe("[hashtree] Unknown command: frobnicate");
    expect(err[1]).toContain("Usage:");
  });

  it("demo changes and restores the root", () => {
    expect(cli("demo")).toBe(0);
    expect(out).toEqual([
      `Original Merkle root: ${R1}\n`,
      `Updated Merkle root: ${R2}\n`,
      `Reverted Merkle root: ${R1}\n`,
      "All checks passed.\n",
    ]);
  });

  it("version", () => {
    expect(cli("version")).toBe(0);
    expect(out).toEqual(["hashtree cli v1\n"]);
  });
});

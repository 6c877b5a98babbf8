// packages/merkle/src/cli/hashtree.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";

import {
  DEFAULT_ALGORITHM,
  createDigest,
  hashData,
  isHexDigest,
  parseDigestAlgorithm,
  type DigestAlgorithm,
} from "@hashtree/digest";

import { toMerkleResult, type MerkleResult } from "../errors.js";
import { parseLeavesDocument, toLeafDigests } from "../leaves.js";
import { verifyMerkleRoot } from "../merkle-root.js";
import { MerkleTree } from "../merkle-tree.js";

const VERSION = "hashtree cli v1";

function usage(): string {
  return `hashtree - Merkle root calculator

Usage:
  hashtree --help
  hashtree version

  hashtree root <leaves.json> [--digests] [--algo <name>] [--json]
  hashtree layers <leaves.json> [--digests] [--algo <name>] [--json]
  hashtree update <leaves.json> --index <n> --value <json> [--digests] [--algo <name>] [--json]
  hashtree verify <leaves.json> --expect <hex> [--digests] [--algo <name>] [--json]
  hashtree hash <json-value> [--algo <name>]
  hashtree demo

Leaves file: a JSON array of values, or { "leaves": [...], "algorithm": "sha256" }.
  --digests   entries are already hex digests (used as leaves unchanged)
  --algo      sha256 (default), sha384, sha512; overrides the file's "algorithm"
  --value     parsed as JSON when possible, otherwise taken as a plain string

Examples:
  hashtree root leaves.json
  hashtree update leaves.json --index 0 --value new_data1 --json
  hashtree verify leaves.json --expect b54e0de6...
`;
}

/** Input problem the user can fix; reported on stderr, exit 1. */
class CliError extends Error {
  constructor(message: string, readonly showUsage = false) {
    super(message);
    this.name = "CliError";
  }
}

// -------------------- output helpers --------------------

function writeLine(line: string): void {
  process.stdout.write(line + "\n");
}

function writeJsonPretty(obj: unknown): void {
  process.stdout.write(JSON.stringify(obj, null, 2) + "\n");
}

// -------------------- input helpers --------------------

function readJsonFile(filePath: string): unknown {
  const abs = path.resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(abs, "utf8");
  } catch {
    throw new CliError(`file not found: ${filePath}`);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new CliError(`"${filePath}" is not valid JSON. First 120 chars: ${raw.slice(0, 120)}`);
  }
}

/** JSON when it parses, the raw string otherwise (so `--value data1` works). */
function parseValueArg(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function requirePositional(args: string[], what: string): string {
  const v = args[1];
  if (!v || v.startsWith("--")) throw new CliError(`Missing ${what}.`, true);
  return v;
}

function resolveAlgorithm(flag: string | null, fromFile: DigestAlgorithm | null): DigestAlgorithm {
  if (flag === null) return fromFile ?? DEFAULT_ALGORITHM;
  const r = parseDigestAlgorithm(flag);
  if (!r.ok) throw new CliError(r.message);
  return r.algorithm;
}

type LoadedTree = {
  tree: MerkleTree;
  algorithm: DigestAlgorithm;
  prehashed: boolean;
};

function loadTree(args: string[]): LoadedTree {
  const file = requirePositional(args, "leaves file");
  const prehashed = args.includes("--digests");

  const parsed = parseLeavesDocument(readJsonFile(file));
  if (!parsed.ok) throw new CliError(`"${file}" is not a leaves document: ${parsed.issues.join("; ")}`);

  const algorithm = resolveAlgorithm(getFlagValue(args, "--algo"), parsed.leaves.algorithm);

  const digests = toLeafDigests(parsed.leaves.values, algorithm, prehashed);
  if (!digests.ok) throw new CliError(`"${file}" has invalid leaf digests: ${digests.issues.join("; ")}`);

  const tree = MerkleTree.fromLeaves(digests.digests, { digest: createDigest(algorithm) });
  return { tree, algorithm, prehashed };
}

function failResult(result: { code: string; message: string }, asJson: boolean): number {
  if (asJson) writeJsonPretty({ ok: false, code: result.code, message: result.message });
  else console.error(`[hashtree] ${result.message}`);
  return 1;
}

// -------------------- commands --------------------

function cmdRoot(args: string[], asJson: boolean): number {
  const { tree, algorithm } = loadTree(args);
  const r = tree.tryRoot();
  if (!r.ok) return failResult(r, asJson);

  if (asJson) {
    writeJsonPretty({ ok: true, algorithm, leaf_count: tree.leafCount, root: r.value });
  } else {
    writeLine(`root: ${r.value}`);
    writeLine(`leaves: ${tree.leafCount}`);
  }
  return 0;
}

function cmdLayers(args: string[], asJson: boolean): number {
  const { tree, algorithm } = loadTree(args);
  const layers = tree.layers();

  if (asJson) {
    writeJsonPretty({ ok: true, algorithm, depth: tree.depth, layers });
    return 0;
  }

  if (!layers.length) {
    writeLine("(empty tree)");
    return 0;
  }
  layers.forEach((layer, i) => writeLine(`layer ${i}: ${layer.join(" ")}`));
  return 0;
}

function parseIndexFlag(args: string[]): number {
  const raw = getFlagValue(args, "--index");
  if (raw === null) throw new CliError("Missing --index <n>", true);
  if (!/^-?\d+$/.test(raw)) throw new CliError(`--index must be an integer, got: ${raw}`);
  return Number(raw);
}

function cmdUpdate(args: string[], asJson: boolean): number {
  const { tree, algorithm, prehashed } = loadTree(args);
  const index = parseIndexFlag(args);
  const rawValue = getFlagValue(args, "--value");
  if (rawValue === null) throw new CliError("Missing --value <json>", true);

  const before = tree.tryRoot();
  const old_root = before.ok ? before.value : null;

  let result: MerkleResult<string>;
  if (prehashed) {
    if (!isHexDigest(rawValue, algorithm)) throw new CliError(`--value must be a lowercase hex ${algorithm} digest with --digests`);
    result = toMerkleResult(() => {
      tree.updateDigest(index, rawValue);
      return tree.root();
    });
  } else {
    result = tree.tryUpdate(index, parseValueArg(rawValue));
  }
  if (!result.ok) return failResult(result, asJson);

  const leaf = tree.leaf(index);
  if (asJson) {
    writeJsonPretty({ ok: true, index, leaf, old_root, new_root: result.value });
  } else {
    writeLine(`leaf[${index}]: ${leaf}`);
    writeLine(`old_root: ${old_root ?? "(none)"}`);
    writeLine(`new_root: ${result.value}`);
  }
  return 0;
}

function cmdVerify(args: string[], asJson: boolean): number {
  const { tree, algorithm } = loadTree(args);
  const expected = getFlagValue(args, "--expect");

  const layers = tree.layers();
  const r = verifyMerkleRoot(layers[0] ?? [], expected, createDigest(algorithm));

  if (asJson) {
    writeJsonPretty(r);
  } else {
    writeLine(`ok: ${r.ok}`);
    writeLine(`expected_root: ${r.expected_root ?? "(none)"}`);
    writeLine(`computed_root: ${r.computed_root ?? "(none)"}`);
    if (!r.ok) console.error(`[hashtree] ${r.code}: ${r.message}`);
  }
  return r.ok ? 0 : 1;
}

function cmdHash(args: string[]): number {
  const raw = requirePositional(args, "value");
  const algorithm = resolveAlgorithm(getFlagValue(args, "--algo"), null);
  writeLine(hashData(parseValueArg(raw), algorithm));
  return 0;
}

/**
 * Build over data1..data4, change leaf 0, change it back.
 * The root must move on the change and return exactly on the revert.
 */
function cmdDemo(): number {
  const tree = MerkleTree.fromValues(["data1", "data2", "data3", "data4"]);

  const original = tree.root();
  writeLine(`Original Merkle root: ${original}`);

  tree.update(0, "new_data1");
  const updated = tree.root();
  writeLine(`Updated Merkle root: ${updated}`);

  tree.update(0, "data1");
  const reverted = tree.root();
  writeLine(`Reverted Merkle root: ${reverted}`);

  if (original === updated) {
    console.error("[hashtree] Merkle roots are the same after update!");
    return 1;
  }
  if (original !== reverted) {
    console.error("[hashtree] Merkle roots are different after reverting update!");
    return 1;
  }

  writeLine("All checks passed.");
  return 0;
}

// -------------------- dispatch --------------------

function dispatch(args: string[]): number {
  const cmd = args[0];
  const asJson = args.includes("--json");

  switch (cmd) {
    case "version":
      writeLine(VERSION);
      return 0;
    case "root":
      return cmdRoot(args, asJson);
    case "layers":
      return cmdLayers(args, asJson);
    case "update":
      return cmdUpdate(args, asJson);
    case "verify":
      return cmdVerify(args, asJson);
    case "hash":
      return cmdHash(args);
    case "demo":
      return cmdDemo();
    default:
      throw new CliError(`Unknown command: ${cmd}`, true);
  }
}

/**
 * Run the CLI against `argv` (node-style: [runtime, script, ...args]).
 * Returns the process exit code.
 */
export function run(argv: string[] = process.argv): number {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    process.stdout.write(usage());
    return 0;
  }

  try {
    return dispatch(args);
  } catch (err) {
    if (!(err instanceof CliError)) throw err;
    console.error(`[hashtree] ${err.message}`);
    if (err.showUsage) console.error(usage());
    return 1;
  }
}

// Entrypoint: execute when this file is the invoked script (tsx / built js)
const argv1 = process.argv[1] ?? "";
if (argv1.endsWith("hashtree.ts") || argv1.endsWith("hashtree.js")) {
  process.exitCode = run(process.argv);
}

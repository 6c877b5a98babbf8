// examples/run-merkle-update.ts
import { hashData } from "../packages/digest/src/index.js";
import { MerkleTree, verifyMerkleRoot } from "../packages/merkle/src/index.js";

function main() {
  const values = ["data1", "data2", "data3", "data4"];
  const leaves = values.map((v) => hashData(v));

  const tree = MerkleTree.fromLeaves(leaves);
  const original = tree.root();
  console.log("Original Merkle root:", original);

  tree.update(0, "new_data1");
  const updated = tree.root();
  console.log("Updated Merkle root:", updated);
  if (original === updated) throw new Error("Merkle roots are the same after update!");

  // the recorded root no longer matches the changed data
  const tamper = verifyMerkleRoot(tree.layers()[0] ?? [], original);
  console.log("verify against original:", tamper.ok ? "OK" : tamper.code);

  tree.update(0, "data1");
  const reverted = tree.root();
  console.log("Reverted Merkle root:", reverted);
  if (original !== reverted) throw new Error("Merkle roots are different after reverting update!");

  const oob = tree.tryUpdate(values.length, "data5");
  console.log("update past the last leaf:", oob.ok ? "accepted?!" : oob.code);

  console.log("All checks passed.");
}

main();

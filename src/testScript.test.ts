import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { test } from "node:test";

const srcDir = path.dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(srcDir, "..", "package.json"), "utf-8"));

function testScript(): string {
  if (typeof packageJson === "object" && packageJson !== null && "scripts" in packageJson) {
    const { scripts } = packageJson;
    if (typeof scripts === "object" && scripts !== null && "test" in scripts && typeof scripts.test === "string") {
      return scripts.test;
    }
  }
  assert.fail("package.json has no test script");
}

test("the test script's shell globs reach every test file under src", () => {
  const script = testScript();
  assert.ok(script.includes("src/*.test.ts"), script);
  assert.ok(script.includes("src/*/*.test.ts"), script);

  const testFiles = fs
    .readdirSync(srcDir, { recursive: true, encoding: "utf-8" })
    .filter((file) => file.endsWith(".test.ts"));
  assert.ok(testFiles.length > 0);
  for (const file of testFiles) {
    const depth = file.split(path.sep).length - 1;
    assert.ok(depth <= 1, `${file} sits deeper than the test globs reach`);
  }
});

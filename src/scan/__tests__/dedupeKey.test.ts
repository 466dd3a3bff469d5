import assert from "node:assert/strict";
import { test } from "node:test";
import { makeFinding } from "../../__tests__/fixtures.js";
import { dedupeFindings, findingDedupeKey, findingId, normalizeFilepath, normalizeFindings } from "../dedupeKey.js";

test("normalizeFilepath strips ./ and converts backslashes", () => {
  assert.equal(normalizeFilepath("./app/db.py"), "app/db.py");
  assert.equal(normalizeFilepath("app\\sub\\db.py"), "app/sub/db.py");
  assert.equal(normalizeFilepath(".\\app//db.py"), "app/db.py");
});

test("findingDedupeKey combines path, line and lowercased title", () => {
  assert.equal(
    findingDedupeKey({ filepath: "./app/db.py", line: 12, title: "Formatted-SQL-Query" }),
    "app/db.py:12:formatted-sql-query"
  );
});

test("findingId is stable and 16 hex characters", () => {
  const id = findingId({ filepath: "app/db.py", line: 12, title: "x" });
  assert.match(id, /^[0-9a-f]{16}$/);
  assert.equal(findingId({ filepath: "./app/db.py", line: 12, title: "X" }), id);
});

test("dedupeFindings keeps the first occurrence in input order", () => {
  const semgrep = makeFinding({ tool: "semgrep", title: "hardcoded_password", line: 3, filepath: "app/settings.py" });
  const bandit = makeFinding({
    tool: "bandit",
    title: "HARDCODED_PASSWORD",
    line: 3,
    filepath: "./app/settings.py",
    severity: "low"
  });
  const other = makeFinding({ line: 4, filepath: "app/settings.py" });

  assert.deepEqual(dedupeFindings([semgrep, bandit, other]), [semgrep, other]);
  assert.deepEqual(normalizeFindings([semgrep], [bandit, other]), [semgrep, other]);
});

import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { expandHome, guardPath, safeJoin } from "../src/utils/paths.js";
import { isImageError } from "../src/utils/errors.js";
import { withTempDir, writeFile } from "./helpers/fake-tools.js";

test("expandHome replaces a leading tilde only", () => {
  assert.equal(expandHome("~"), os.homedir());
  assert.equal(expandHome("~/images/a.iso"), path.join(os.homedir(), "images/a.iso"));
  assert.equal(expandHome("/tmp/~/a.iso"), "/tmp/~/a.iso");
});

test("guardPath resolves and checks each kind", async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, "image.iso");
    await writeFile(file, "data");

    assert.equal(await guardPath(file, "file"), file);
    assert.equal(await guardPath(dir, "directory"), dir);
    assert.equal(await guardPath(path.join(dir, "new.iso"), "absent"), path.join(dir, "new.iso"));
    assert.equal(await guardPath(path.join(dir, "new.iso"), "parentDirectory"), path.join(dir, "new.iso"));

    await assert.rejects(guardPath(dir, "file"), (err) => isImageError(err, "NotFound"));
    await assert.rejects(guardPath(path.join(dir, "missing.iso"), "file"), (err) => isImageError(err, "NotFound"));
    await assert.rejects(guardPath(file, "directory"), (err) => isImageError(err, "NotADirectory"));
    await assert.rejects(guardPath(file, "absent"), (err) => isImageError(err, "AlreadyExists"));
    await assert.rejects(guardPath(path.join(dir, "nope", "out.iso"), "parentDirectory"), (err) =>
      isImageError(err, "NotADirectory")
    );
  });
});

test("guardPath treats a dangling symlink as an existing path", async () => {
  await withTempDir(async (dir) => {
    const link = path.join(dir, "out.iso");
    await fs.symlink(path.join(dir, "gone"), link);
    await assert.rejects(guardPath(link, "absent"), (err) => isImageError(err, "AlreadyExists"));
  });
});

test("safeJoin rejects paths leaving the root", () => {
  assert.equal(safeJoin("/srv/tree", "usr/share/a.png"), "/srv/tree/usr/share/a.png");
  assert.throws(() => safeJoin("/srv/tree", "../etc/passwd"), (err) => isImageError(err, "InvalidArgument"));
  assert.throws(() => safeJoin("/srv/tree", "/etc/passwd"), (err) => isImageError(err, "InvalidArgument"));
});

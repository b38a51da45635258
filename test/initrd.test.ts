import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import { gunzipSync, gzipSync } from "node:zlib";
import { appendFilesToInitrd, appendToInitrd } from "../src/iso/initrd.js";
import { isImageError, ProcessFailureError } from "../src/utils/errors.js";
import { appendingCpio, argAfter, fakeTools, modeOf, withTempDir, writeFile } from "./helpers/fake-tools.js";

async function setupArchive(dir: string): Promise<{ archive: string; base: string }> {
  const archive = path.join(dir, "install.amd", "gtk", "initrd.gz");
  const base = path.join(dir, "staging");
  await writeFile(archive, gzipSync(Buffer.from("NEWC-ARCHIVE;")), 0o444);
  await fs.chmod(path.dirname(archive), 0o555);
  await writeFile(path.join(base, "preseed.cfg"), "d-i debian-installer/locale string en_US");
  await writeFile(path.join(base, "usr", "share", "graphics", "logo_debian.png"), "png");
  return { archive, base };
}

test("appendToInitrd pipes the relative path to cpio and recompresses", async () => {
  await withTempDir(async (dir) => {
    const { archive, base } = await setupArchive(dir);
    const { tools, calls } = fakeTools({ cpio: appendingCpio });

    await appendToInitrd(archive, base, "preseed.cfg", { tools });

    assert.equal(calls.length, 1);
    assert.deepEqual(calls[0].args.slice(0, 5), ["-H", "newc", "-o", "-A", "-F"]);
    assert.equal(path.basename(argAfter(calls[0].args, "-F")), "initrd");
    assert.equal(calls[0].cwd, base);
    assert.equal(calls[0].input, "preseed.cfg");

    const raw = gunzipSync(await fs.readFile(archive)).toString("utf8");
    assert.equal(raw, "NEWC-ARCHIVE;CPIO:preseed.cfg");
    assert.equal(await modeOf(archive), 0o444);
    assert.equal(await modeOf(path.dirname(archive)), 0o555);
    assert.deepEqual(await fs.readdir(path.dirname(archive)), ["initrd.gz"]);
  });
});

test("appendFilesToInitrd appends several files in one cpio run", async () => {
  await withTempDir(async (dir) => {
    const { archive, base } = await setupArchive(dir);
    const { tools, calls } = fakeTools({ cpio: appendingCpio });

    await appendFilesToInitrd(archive, base, ["preseed.cfg", "usr/share/graphics/logo_debian.png"], { tools });

    assert.equal(calls.length, 1);
    assert.equal(calls[0].input, "preseed.cfg\nusr/share/graphics/logo_debian.png");
  });
});

test("appendToInitrd can hand cpio the absolute path", async () => {
  await withTempDir(async (dir) => {
    const { archive, base } = await setupArchive(dir);
    const { tools, calls } = fakeTools({ cpio: appendingCpio });

    await appendToInitrd(archive, base, "preseed.cfg", { tools, inputPath: "absolute" });

    assert.equal(calls[0].input, path.join(base, "preseed.cfg"));
  });
});

test("appendToInitrd rejects archives not named initrd.gz before touching anything", async () => {
  const { tools, calls } = fakeTools({ cpio: appendingCpio });
  await assert.rejects(appendToInitrd("/nonexistent/initrd.img", "/nonexistent", "a.cfg", { tools }), (err) =>
    isImageError(err, "InvalidFormat")
  );
  assert.equal(calls.length, 0);
});

test("appendToInitrd checks the archive and the input file", async () => {
  await withTempDir(async (dir) => {
    const { archive, base } = await setupArchive(dir);
    const { tools } = fakeTools({ cpio: appendingCpio });

    await assert.rejects(appendToInitrd(path.join(dir, "initrd.gz"), base, "preseed.cfg", { tools }), (err) =>
      isImageError(err, "NotFound")
    );
    await assert.rejects(appendToInitrd(archive, base, "missing.cfg", { tools }), (err) => isImageError(err, "NotFound"));
    await assert.rejects(appendToInitrd(archive, base, "../escape.cfg", { tools }), (err) =>
      isImageError(err, "InvalidArgument")
    );
    assert.equal(await modeOf(archive), 0o444);
  });
});

test("a failing cpio keeps the original archive and restores permissions", async () => {
  await withTempDir(async (dir) => {
    const { archive, base } = await setupArchive(dir);
    const before = await fs.readFile(archive);
    const { tools } = fakeTools({
      cpio: async () => ({ status: 2, stdout: "", stderr: "cpio: premature end of archive" })
    });

    await assert.rejects(appendToInitrd(archive, base, "preseed.cfg", { tools }), (err) => {
      assert.ok(err instanceof ProcessFailureError);
      assert.equal(err.code, "ProcessFailure");
      assert.equal(err.status, 2);
      assert.equal(err.path, archive);
      return true;
    });
    assert.deepEqual(await fs.readFile(archive), before);
    assert.equal(await modeOf(archive), 0o444);
    assert.equal(await modeOf(path.dirname(archive)), 0o555);
    assert.deepEqual(await fs.readdir(path.dirname(archive)), ["initrd.gz"]);
  });
});

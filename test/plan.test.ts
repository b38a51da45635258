import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import { detectDebianRelease, planDebianEdits } from "../src/iso/debian.js";
import { createEditPlan } from "../src/iso/plan.js";
import { isImageError } from "../src/utils/errors.js";
import { withTempDir, writeFile } from "./helpers/fake-tools.js";

test("detectDebianRelease reads architecture and release from the file name", () => {
  assert.deepEqual(detectDebianRelease("/srv/debian-12.5.0-amd64-netinst.iso"), {
    arch: "amd",
    dist: "bookworm",
    testing: "testing"
  });
  assert.deepEqual(detectDebianRelease("debian-11.9.0-i386-netinst.iso"), { arch: "386", dist: "bullseye", testing: "" });
});

test("planDebianEdits stages the logo for the graphical initrd", async () => {
  await withTempDir(async (dir) => {
    const logo = path.join(dir, "logo.png");
    const staging = path.join(dir, "staging");
    await writeFile(logo, "png-bytes");
    await fs.mkdir(staging);

    const edits = await planDebianEdits({
      release: { arch: "amd", dist: "bookworm", testing: "testing" },
      overlay: path.join(dir, "overlay"),
      logo,
      stagingDir: staging
    });

    assert.deepEqual(edits, [
      { type: "delete", path: "install.amd/xen" },
      { type: "copy", source: path.join(dir, "overlay") },
      { type: "substitute", patterns: ["isolinux/menu.cfg"], placeholder: "__ARCH__", value: "amd" },
      { type: "substitute", patterns: ["preseeds/*"], placeholder: "__DIST__", value: "bookworm" },
      { type: "substitute", patterns: ["preseeds/*"], placeholder: "__TESTING__", value: "testing" },
      {
        type: "initrd",
        archive: "install.amd/gtk/initrd.gz",
        baseDir: staging,
        files: ["usr/share/graphics/logo_debian.png"]
      }
    ]);
    assert.equal(await fs.readFile(path.join(staging, "usr", "share", "graphics", "logo_debian.png"), "utf8"), "png-bytes");
  });
});

test("createEditPlan builds a plain overlay and initrd plan", async () => {
  const plan = createEditPlan({
    image: "custom.iso",
    arch: "arm64",
    overlay: "/srv/overlay",
    initrdBase: "/srv/initrd-files",
    initrdFiles: ["preseed.cfg"]
  });
  assert.equal(typeof plan, "function");
  if (typeof plan !== "function") return;

  assert.deepEqual(await plan({ treeRoot: "/tmp/tree", stagingDir: "/tmp/staging" }), [
    { type: "copy", source: "/srv/overlay" },
    { type: "initrd", archive: "install.arm64/gtk/initrd.gz", baseDir: "/srv/initrd-files", files: ["preseed.cfg"] }
  ]);
});

test("createEditPlan rejects incomplete initrd options", () => {
  assert.throws(() => createEditPlan({ image: "a.iso", arch: "amd", initrdFiles: ["preseed.cfg"] }), (err) =>
    isImageError(err, "InvalidArgument")
  );
  assert.throws(() => createEditPlan({ image: "a.iso", initrdBase: "/srv", initrdFiles: ["preseed.cfg"] }), (err) =>
    isImageError(err, "InvalidArgument")
  );
  assert.throws(() => createEditPlan({ image: "a.iso", logo: "/srv/logo.png" }), (err) =>
    isImageError(err, "InvalidArgument")
  );
});

import test, { afterEach, beforeEach } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs/promises";
import path from "node:path";
import { generateAndroidIcons } from "../../generator/lib/android";
import { IconGenerationError } from "../../generator/lib/errors";
import { findContentBounds, loadRgba } from "../../generator/lib/raster";
import { FIXTURES_DIR, createPlatformContext, createTempProject, exists, pixelAt, removeTempProject } from "../helpers";

let root = "";

beforeEach(async () => {
  root = await createTempProject("iconforge-android-");
});

afterEach(async () => {
  await removeTempProject(root);
});

test("generateAndroidIcons writes every layer, launcher and notification icon", async () => {
  const ctx = await createPlatformContext(root, { backgroundColor: "#336699" });
  const res = ctx.project.android.resDir;

  const written = await generateAndroidIcons(ctx);

  assert.equal(written.length, 23);
  for (const density of ["mdpi", "hdpi", "xhdpi", "xxhdpi", "xxxhdpi"]) {
    assert.ok(written.includes(path.join(res, `mipmap-${density}`, "ic_launcher_foreground.png")));
    assert.ok(written.includes(path.join(res, `mipmap-${density}`, "ic_launcher_monochrome.png")));
    assert.ok(written.includes(path.join(res, `mipmap-${density}`, "ic_launcher.png")));
    assert.ok(written.includes(path.join(res, `drawable-${density}`, "ic_notification.png")));
  }
  assert.ok(await exists(path.join(res, "mipmap-anydpi-v26", "ic_launcher.xml")));
  assert.ok(await exists(path.join(res, "mipmap-anydpi-v26", "ic_launcher_round.xml")));
});

test("foreground layers are trimmed and centered inside the safe zone", async () => {
  const ctx = await createPlatformContext(root);

  await generateAndroidIcons(ctx);
  const layer = await loadRgba(path.join(ctx.project.android.resDir, "mipmap-hdpi", "ic_launcher_foreground.png"));
  const bounds = findContentBounds(layer);

  assert.equal(layer.width, 162);
  assert.equal(layer.height, 162);
  assert.ok(bounds);
  // the 2:1 bar fills the 99px safe-zone width
  assert.equal(bounds.width, 99);
  assert.equal(bounds.left, 31);
  assert.ok(Math.abs(bounds.height - 50) <= 2);
  assert.deepEqual(pixelAt(layer, 81, 81), [255, 255, 255, 255]);
  assert.deepEqual(pixelAt(layer, 0, 0), [0, 0, 0, 0]);
});

test("the monochrome layer uses its own source and is whited out", async () => {
  const monochrome = path.join(root, "assets", "icons", "mono.svg");
  await fs.copyFile(path.join(FIXTURES_DIR, "monochrome.svg"), monochrome);
  const ctx = await createPlatformContext(root, { monochrome: "assets/icons/mono.svg" });

  await generateAndroidIcons(ctx);
  const layer = await loadRgba(path.join(ctx.project.android.resDir, "mipmap-mdpi", "ic_launcher_monochrome.png"));

  assert.equal(layer.width, 108);
  assert.deepEqual(pixelAt(layer, 54, 54), [255, 255, 255, 255]);
  const bounds = findContentBounds(layer);
  assert.ok(bounds);
  assert.equal(bounds.width, 66);
  assert.equal(bounds.height, 66);
});

test("legacy launcher icons sit on the background color", async () => {
  const ctx = await createPlatformContext(root, { backgroundColor: "#336699" });

  await generateAndroidIcons(ctx);
  const launcher = await loadRgba(path.join(ctx.project.android.resDir, "mipmap-mdpi", "ic_launcher.png"));

  assert.equal(launcher.width, 48);
  assert.deepEqual(pixelAt(launcher, 0, 0), [51, 102, 153, 255]);
  assert.deepEqual(pixelAt(launcher, 24, 24), [255, 255, 255, 255]);
});

test("notification icons are white on transparent", async () => {
  const ctx = await createPlatformContext(root);

  await generateAndroidIcons(ctx);
  const icon = await loadRgba(path.join(ctx.project.android.resDir, "drawable-xxxhdpi", "ic_notification.png"));

  assert.equal(icon.width, 96);
  assert.equal(icon.height, 96);
  assert.deepEqual(pixelAt(icon, 48, 48), [255, 255, 255, 255]);
  assert.equal(pixelAt(icon, 2, 2)[3], 0);
});

test("optional launcher and notification outputs can be turned off", async () => {
  const ctx = await createPlatformContext(root, { android: { legacyLauncher: false, notification: false } });

  const written = await generateAndroidIcons(ctx);

  assert.equal(written.length, 13);
  assert.equal(await exists(path.join(ctx.project.android.resDir, "drawable-hdpi")), false);
  assert.equal(await exists(path.join(ctx.project.android.resDir, "mipmap-hdpi", "ic_launcher.png")), false);
});

test("an existing colors.xml keeps its other colors", async () => {
  const ctx = await createPlatformContext(root, { backgroundColor: "#0a0b0c" });
  const valuesDir = path.join(ctx.project.android.resDir, "values");
  await fs.mkdir(valuesDir, { recursive: true });
  await fs.writeFile(
    path.join(valuesDir, "colors.xml"),
    '<resources>\n    <color name="accent">#FF0000</color>\n</resources>\n',
    "utf-8",
  );

  await generateAndroidIcons(ctx);

  assert.equal(
    await fs.readFile(path.join(valuesDir, "colors.xml"), "utf-8"),
    '<resources>\n    <color name="accent">#FF0000</color>\n    <color name="ic_launcher_background">#0A0B0C</color>\n</resources>\n',
  );
});

test("a missing foreground fails before anything is written", async () => {
  await fs.rm(path.join(root, "assets", "icons", "foreground.svg"));
  const ctx = await createPlatformContext(root);

  await assert.rejects(
    generateAndroidIcons(ctx),
    (error: unknown) => error instanceof IconGenerationError && error.code === "SOURCE_NOT_FOUND",
  );
  assert.equal(await exists(ctx.project.android.resDir), false);
});

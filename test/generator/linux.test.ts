import test, { afterEach, beforeEach } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs/promises";
import path from "node:path";
import { generateLinuxIcons } from "../../generator/lib/linux";
import { loadRgba } from "../../generator/lib/raster";
import { createPlatformContext, createTempProject, removeTempProject } from "../helpers";

let root = "";

beforeEach(async () => {
  root = await createTempProject("iconforge-linux-");
});

afterEach(async () => {
  await removeTempProject(root);
});

test("generateLinuxIcons writes sized icons under both naming schemes", async () => {
  const ctx = await createPlatformContext(root, { linux: { sizes: [16, 32], defaultSize: 32 } });
  const iconsDir = ctx.project.linux.iconsDir;

  const written = await generateLinuxIcons(ctx);

  assert.deepEqual(
    written.map((file) => path.relative(root, file)),
    [
      "linux/icons/app-16.png",
      "linux/icons/com.example.app-16.png",
      "linux/icons/app-32.png",
      "linux/icons/com.example.app-32.png",
      "linux/icons/app.png",
      "linux/icons/com.example.app.png",
      "linux/icons/app.svg",
      "linux/icons/com.example.app.svg",
      "linux/app.desktop",
    ],
  );

  const small = await loadRgba(path.join(iconsDir, "app-16.png"));
  assert.equal(small.width, 16);
  assert.equal(small.height, 16);

  const defaultIcon = await fs.readFile(path.join(iconsDir, "app.png"));
  assert.deepEqual(defaultIcon, await fs.readFile(path.join(iconsDir, "app-32.png")));
  assert.deepEqual(
    await fs.readFile(path.join(iconsDir, "com.example.app.png")),
    await fs.readFile(path.join(iconsDir, "com.example.app-32.png")),
  );

  assert.equal(
    await fs.readFile(path.join(iconsDir, "com.example.app.svg"), "utf-8"),
    await fs.readFile(ctx.project.source, "utf-8"),
  );
});

test("generateLinuxIcons writes the desktop entry from the project settings", async () => {
  const ctx = await createPlatformContext(root, {
    appName: "Tunes",
    appId: "org.example.tunes",
    iconName: "tunes",
    linux: {
      sizes: [16],
      defaultSize: 16,
      comment: "Music player",
      categories: ["AudioVideo", "Audio"],
      desktopFile: "packaging/tunes.desktop",
    },
  });

  await generateLinuxIcons(ctx);

  assert.equal(
    await fs.readFile(path.join(root, "packaging", "tunes.desktop"), "utf-8"),
    [
      "[Desktop Entry]",
      "Version=1.0",
      "Type=Application",
      "Name=Tunes",
      "Comment=Music player",
      "Exec=tunes",
      "Icon=org.example.tunes",
      "Terminal=false",
      "Categories=AudioVideo;Audio;",
      "StartupWMClass=Tunes",
      "",
    ].join("\n"),
  );
});

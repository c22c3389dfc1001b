import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { rmSync } from "node:fs";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { preprocessImage } from "../preprocess";

async function makeImage(path: string, width: number, height: number, grey = 255) {
  await sharp({
    create: { width, height, channels: 3, background: { r: grey, g: grey, b: grey } },
  })
    .png()
    .toFile(path);
}

describe("preprocessImage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pagesift-image-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("fits the longest side within maxDim", async () => {
    const path = join(dir, "page.png");
    await makeImage(path, 400, 200);

    const image = await preprocessImage(path, { maxDim: 100 });
    const meta = await sharp(image.data).metadata();

    expect(image.mimeType).toBe("image/png");
    expect([meta.format, meta.width, meta.height]).toEqual(["png", 100, 50]);
  });

  test("never enlarges small pages", async () => {
    const path = join(dir, "page.png");
    await makeImage(path, 400, 200);

    const meta = await sharp((await preprocessImage(path, { maxDim: 1000 })).data).metadata();

    expect([meta.width, meta.height]).toEqual([400, 200]);
  });

  test("crops margins", async () => {
    const path = join(dir, "page.png");
    await makeImage(path, 400, 200);

    const image = await preprocessImage(path, { margins: [10, 20, 30, 40] });
    const meta = await sharp(image.data).metadata();

    expect([meta.width, meta.height]).toEqual([360, 140]);
  });

  test("stretches contrast around mid-grey", async () => {
    const path = join(dir, "page.png");
    await makeImage(path, 4, 4, 100);

    const image = await preprocessImage(path, { contrastFactor: 2 });
    const pixels = await sharp(image.data).raw().toBuffer();

    expect([pixels[0], pixels[1], pixels[2]]).toEqual([72, 72, 72]);
  });

  test("re-encodes in the requested format", async () => {
    const path = join(dir, "page.png");
    await makeImage(path, 40, 20);

    const image = await preprocessImage(path, { outputFormat: "jpeg" });

    expect(image.mimeType).toBe("image/jpeg");
    expect((await sharp(image.data).metadata()).format).toBe("jpeg");
  });
});

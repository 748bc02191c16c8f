import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import { CONFIG_FILE_NAME, ConfigError, findConfigFile, loadUploaderConfig } from "../config";
import { makeTempDir, removeTempDir } from "../test/fakes";

const credentials = [
  "IMAGEKIT_PUBLIC_KEY=test-public",
  "IMAGEKIT_PRIVATE_KEY=test-secret",
  "IMAGEKIT_URL_ENDPOINT=https://ik.test/demo",
].join("\n");

describe("config", () => {
  let home: string;
  let cwd: string;

  beforeEach(async () => {
    home = await makeTempDir("gallery-home-");
    cwd = await makeTempDir("gallery-cwd-");
    await fs.mkdir(path.join(home, "scratch"));
  });

  afterEach(async () => {
    await removeTempDir(home);
    await removeTempDir(cwd);
  });

  const writeConfig = (dir: string, body: string) => fs.writeFile(path.join(dir, CONFIG_FILE_NAME), body);

  it("applies defaults and resolves paths against the config file's directory", async () => {
    await writeConfig(home, `TMP_DIR=scratch\nHTML_HEADER_PATH=header.html\n${credentials}\n`);

    const config = await loadUploaderConfig({ cwd, homeDir: home, env: {} });

    expect(config).toMatchObject({
      configFilePath: path.join(home, CONFIG_FILE_NAME),
      tmpDir: path.join(home, "scratch"),
      outputHtmlFilename: "listing.html",
      fullVariant: { name: "full", width: 1280, height: 1280 },
      thumbVariant: { name: "thumb", width: 320, height: 320 },
      htmlHeaderPath: path.join(home, "header.html"),
      hostingBackend: "imagekit",
      imageKit: {
        publicKey: "test-public",
        privateKey: "test-secret",
        urlEndpoint: "https://ik.test/demo",
        folder: "/gallery",
      },
      logPretty: true,
    });
    expect(config.htmlFooterPath).toBeUndefined();
  });

  it("prefers the home directory file over the working directory one", async () => {
    await writeConfig(home, "TMP_DIR=.\n");
    await writeConfig(cwd, "TMP_DIR=.\n");

    expect(await findConfigFile(cwd, home)).toBe(path.join(home, CONFIG_FILE_NAME));
  });

  it("falls back to the working directory file", async () => {
    await writeConfig(cwd, `TMP_DIR=.\n${credentials}\n`);

    const config = await loadUploaderConfig({ cwd, homeDir: home, env: {} });
    expect(config.configFilePath).toBe(path.join(cwd, CONFIG_FILE_NAME));
    expect(config.tmpDir).toBe(cwd);
  });

  it("fails when no config file exists", async () => {
    await expect(loadUploaderConfig({ cwd, homeDir: home, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it("lets environment variables override the file", async () => {
    await writeConfig(home, `TMP_DIR=scratch\nTHUMB_WIDTH_PX=320\n${credentials}\n`);

    const config = await loadUploaderConfig({
      cwd,
      homeDir: home,
      env: { THUMB_WIDTH_PX: "200", LOG_PRETTY: "off" },
    });

    expect(config.thumbVariant.width).toBe(200);
    expect(config.logPretty).toBe(false);
  });

  it("rejects a missing TMP_DIR", async () => {
    await writeConfig(home, `${credentials}\n`);

    const error = await loadUploaderConfig({ cwd, homeDir: home, env: {} }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: ["TMP_DIR: Required"] });
  });

  it("rejects a TMP_DIR that does not exist", async () => {
    await writeConfig(home, `TMP_DIR=nowhere\n${credentials}\n`);

    const error = await loadUploaderConfig({ cwd, homeDir: home, env: {} }).catch((err: unknown) => err);
    expect(error).toMatchObject({
      issues: [`TMP_DIR: "${path.join(home, "nowhere")}" does not exist or is not accessible`],
    });
  });

  it("rejects non-positive sizes", async () => {
    await writeConfig(home, `TMP_DIR=scratch\nTARGET_WIDTH_PX=0\n${credentials}\n`);

    const error = await loadUploaderConfig({ cwd, homeDir: home, env: {} }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: [expect.stringMatching(/^TARGET_WIDTH_PX: /)] });
  });

  it("rejects an output file name with a path separator", async () => {
    await writeConfig(home, `TMP_DIR=scratch\nOUTPUT_HTML_FILENAME=../out.html\n${credentials}\n`);

    const error = await loadUploaderConfig({ cwd, homeDir: home, env: {} }).catch((err: unknown) => err);
    expect(error).toMatchObject({
      issues: ["OUTPUT_HTML_FILENAME: must contain only letters, digits, '.', '_' and '-'"],
    });
  });

  it("requires ImageKit credentials for the imagekit backend", async () => {
    await writeConfig(home, "TMP_DIR=scratch\nIMAGEKIT_PUBLIC_KEY=test-public\n");

    const error = await loadUploaderConfig({ cwd, homeDir: home, env: {} }).catch((err: unknown) => err);
    expect(error).toMatchObject({
      issues: [
        "IMAGEKIT_PRIVATE_KEY: is required for the imagekit backend",
        "IMAGEKIT_URL_ENDPOINT: is required for the imagekit backend",
      ],
    });
  });
});

import fs from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { stageLanguageData } from "./TesseractOcrEngine.js";

describe("stageLanguageData", () => {
  let dir: string;
  let packages: string;
  const resolveDir = (lang: string) => join(packages, lang);

  function fakePackage(lang: string, content: string): void {
    fs.mkdirSync(join(packages, lang, "4.0.0_best_int"), { recursive: true });
    fs.writeFileSync(join(packages, lang, "4.0.0_best_int", `${lang}.traineddata.gz`), content);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(join(tmpdir(), "tessdata-"));
    packages = join(dir, "node_modules");
    fakePackage("ita", "ita-model");
    fakePackage("eng", "eng-model");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("copies every language of the spec into one directory", async () => {
    const target = join(dir, "data", "tessdata");

    expect(await stageLanguageData("ita+eng", target, resolveDir)).toEqual(["ita", "eng"]);
    expect(fs.readFileSync(join(target, "ita.traineddata.gz"), "utf8")).toBe("ita-model");
    expect(fs.readFileSync(join(target, "eng.traineddata.gz"), "utf8")).toBe("eng-model");
  });

  it("leaves staged files alone", async () => {
    const target = join(dir, "tessdata");
    fs.mkdirSync(target);
    fs.writeFileSync(join(target, "ita.traineddata.gz"), "kept");

    expect(await stageLanguageData("ita+eng", target, resolveDir)).toEqual(["eng"]);
    expect(fs.readFileSync(join(target, "ita.traineddata.gz"), "utf8")).toBe("kept");
  });

  it("fails for a language without a data package", async () => {
    const missing = (lang: string) => {
      throw new Error(`OCR language "${lang}" is not installed`);
    };

    await expect(stageLanguageData("deu", join(dir, "tessdata"), missing)).rejects.toThrow(
      'OCR language "deu" is not installed',
    );
  });
});

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createInitialState } from "./checkpoint";
import { resolveOutputDir, sanitizeDirName } from "./output-dir";

describe("sanitizeDirName", () => {
  it("replaces characters that are unsafe in file names", () => {
    expect(sanitizeDirName('A/B: "c"')).toBe("A_B_ _c_");
    expect(sanitizeDirName("a\\b*c?d<e>f|g")).toBe("a_b_c_d_e_f_g");
  });

  it.each(["..", ".", "   ", "", ". . ."])("maps %j to untitled", (title) => {
    expect(sanitizeDirName(title)).toBe("untitled");
  });

  it("drops trailing dots and spaces", () => {
    expect(sanitizeDirName("  Battery prices... ")).toBe("Battery prices");
  });

  it("caps the name at 80 characters", () => {
    expect(sanitizeDirName("x".repeat(100))).toBe("x".repeat(80));
  });
});

describe("resolveOutputDir", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "output-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("derives the directory from the Korean title and creates it", () => {
    const state = createInitialState("https://example.com", "");
    state.titleKo = "전기차: 배터리";
    const dir = resolveOutputDir(state, root);
    expect(dir).toBe(path.join(root, "전기차_ 배터리"));
    expect(fs.statSync(dir).isDirectory()).toBe(true);
    expect(state.outputDir).toBe(dir);
  });

  it("keeps the first directory even if the title changes", () => {
    const state = createInitialState("https://example.com", "");
    state.titleKo = "first";
    const first = resolveOutputDir(state, root);
    state.titleKo = "second";
    expect(resolveOutputDir(state, root)).toBe(first);
  });

  it("stays under the output root for a title of dots", () => {
    const state = createInitialState("https://example.com", "");
    state.titleKo = "..";
    expect(resolveOutputDir(state, root)).toBe(path.join(root, "untitled"));
  });

  it("uses untitled when there is no title", () => {
    const state = createInitialState("https://example.com", "");
    expect(resolveOutputDir(state, root)).toBe(path.join(root, "untitled"));
  });
});

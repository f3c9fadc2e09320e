import { describe, expect, test } from "vitest";
import { extractInlineOptions, parseInteger, parseList } from "../../src/config/index.js";
import { UsageError } from "../../src/utils/errors.js";

describe("parseList", () => {
  test("splits on commas and drops blanks", () => {
    expect(parseList(" Documents, ,Pictures ,")).toEqual(["Documents", "Pictures"]);
  });
});

describe("parseInteger", () => {
  test("parses integers", () => {
    expect(parseInteger("port", "8080")).toBe(8080);
    expect(parseInteger("compress", " 0 ")).toBe(0);
  });

  test("rejects anything else", () => {
    expect(() => parseInteger("port", "80x")).toThrow('--port expects an integer (got "80x")');
    expect(() => parseInteger("compress", "1.5")).toThrow(UsageError);
  });
});

describe("extractInlineOptions", () => {
  test("maps every flag onto its override", () => {
    expect(
      extractInlineOptions({
        root: "/data",
        dir: "archives",
        dest: "restored",
        tmp: "staging",
        port: "9000",
        output: "laptop.zip",
        dirs: "notes,photos",
        exclude: "*.log,dist",
        compress: "9",
        "no-notify": true,
        verbose: true,
      }),
    ).toEqual({
      root: "/data",
      archiveDir: "archives",
      destination: "restored",
      tmpDir: "staging",
      output: "laptop.zip",
      port: 9000,
      compression: 9,
      dirs: ["notes", "photos"],
      exclude: ["*.log", "dist"],
      notify: false,
      verbose: true,
    });
  });

  test("returns no overrides for absent flags", () => {
    expect(extractInlineOptions({ "no-notify": false, verbose: false, help: false })).toEqual({});
  });
});

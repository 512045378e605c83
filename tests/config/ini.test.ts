import { describe, expect, test } from "vitest";
import { ConfigError, iniToDocument, parseIni } from "../../src/config";

describe("parseIni", () => {
  test("reads sections and trimmed entries", () => {
    const sections = parseIni(
      ["[cloud]", "  provider =  gdrive  ", "", "[objects]", "app = /data/app.db; 1; Backups/App"].join("\n"),
    );

    expect(sections).toEqual([
      { name: "cloud", entries: [{ key: "provider", value: "gdrive", line: 2 }] },
      {
        name: "objects",
        entries: [{ key: "app", value: "/data/app.db; 1; Backups/App", line: 5 }],
      },
    ]);
  });

  test("ignores comment lines starting with # or ;", () => {
    const sections = parseIni("# heading\n[cloud]\n; provider = old\nprovider = s3\r\n");

    expect(sections).toEqual([
      { name: "cloud", entries: [{ key: "provider", value: "s3", line: 4 }] },
    ]);
  });

  test("keeps everything after the first = in the value", () => {
    const [section] = parseIni("[cloud]\ntelegram = a=b:c\n");

    expect(section?.entries[0]?.value).toBe("a=b:c");
  });

  test("rejects a line without =", () => {
    expect(() => parseIni("[cloud]\nprovider gdrive\n")).toThrow(
      new ConfigError('Line 2: expected "key = value", got "provider gdrive"'),
    );
  });

  test("rejects an entry before any section", () => {
    expect(() => parseIni("provider = gdrive\n")).toThrow(ConfigError);
  });
});

describe("iniToDocument", () => {
  test("maps cloud, paths and objects", () => {
    const document = iniToDocument(
      parseIni(
        [
          "[cloud]",
          "provider = gdrive",
          "telegram = 123:test-secret:-100",
          "keep = 5",
          "[paths]",
          "state = ./state",
          "[objects]",
          "app = /data/app.db; 1; Backups/App",
          "logs = /data/logs.db; 7; Backups/Logs",
          "[extra]",
          "ignored = yes",
        ].join("\n"),
      ),
    );

    expect(document).toEqual({
      cloud: { provider: "gdrive", telegram: "123:test-secret:-100", keep: 5 },
      paths: { state: "./state" },
      objects: ["/data/app.db; 1; Backups/App", "/data/logs.db; 7; Backups/Logs"],
    });
  });

  test("leaves paths out when the section is absent", () => {
    const document = iniToDocument(parseIni("[cloud]\nprovider = gdrive\n"));

    expect(document).toEqual({ cloud: { provider: "gdrive" }, objects: [] });
  });
});

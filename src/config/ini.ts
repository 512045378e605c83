/**
 * INI reader for the backups.ini format.
 *
 * Values are kept verbatim after trimming: `;` is a field separator inside
 * object entries, so it only starts a comment at the beginning of a line.
 */

import type { ConfigDocument } from "../types";
import { ConfigError } from "./validator";

export interface IniEntry {
  key: string;
  value: string;
  line: number;
}

export interface IniSection {
  name: string;
  entries: IniEntry[];
}

const SECTION_HEADER = /^\[([^\]]*)\]$/;

export function parseIni(content: string): IniSection[] {
  const sections: IniSection[] = [];
  let current: IniSection | null = null;

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    const lineNumber = index + 1;

    if (line === "" || line.startsWith("#") || line.startsWith(";")) {
      return;
    }

    const header = SECTION_HEADER.exec(line);
    if (header) {
      current = { name: (header[1] ?? "").trim(), entries: [] };
      sections.push(current);
      return;
    }

    const eq = line.indexOf("=");
    if (eq === -1) {
      throw new ConfigError(`Line ${lineNumber}: expected "key = value", got "${line}"`);
    }
    if (!current) {
      throw new ConfigError(`Line ${lineNumber}: entry outside of any [section]`);
    }

    current.entries.push({
      key: line.slice(0, eq).trim(),
      value: line.slice(eq + 1).trim(),
      line: lineNumber,
    });
  });

  return sections;
}

/**
 * Map the [cloud], [paths] and [objects] sections onto a config document.
 * Unknown sections and keys are ignored.
 */
export function iniToDocument(sections: IniSection[]): unknown {
  const cloud: Record<string, unknown> = {};
  const paths: Record<string, unknown> = {};
  const objects: string[] = [];

  for (const section of sections) {
    for (const { key, value } of section.entries) {
      switch (section.name) {
        case "cloud":
          if (key === "provider") cloud.provider = value;
          else if (key === "telegram") cloud.telegram = value;
          else if (key === "keep") cloud.keep = Number(value);
          break;
        case "paths":
          if (key === "state" || key === "scratch") paths[key] = value;
          break;
        case "objects":
          objects.push(value);
          break;
      }
    }
  }

  const document: Partial<Record<keyof ConfigDocument, unknown>> = { cloud, objects };
  if (Object.keys(paths).length > 0) {
    document.paths = paths;
  }
  return document;
}

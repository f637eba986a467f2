/**
 * Package description reader
 *
 * Reads just enough of a `.cabal` file to answer "which units does this
 * package have, which modules belong to each, and with which flags are they
 * compiled". Layout is indentation based:
 *
 * ```
 * name:          demo
 * library
 *   hs-source-dirs:  src
 *   exposed-modules: Lib
 *                    Lib.Foo
 * executable demo
 *   main-is: Main.hs
 * ```
 *
 * Conditional blocks (`if ...` / `else`) are flattened: their fields count
 * as if written unconditionally. Brace layout is not supported.
 */

import type { ComponentEntrypoint, ComponentInfo, UnitKind, UnitRef } from "./backend.js";

// =============================================================================
// Types
// =============================================================================

export type StanzaType =
  | "library"
  | "executable"
  | "test-suite"
  | "benchmark"
  | "common"
  | "foreign-library"
  | "flag"
  | "source-repository"
  | "custom-setup"
  | "unknown";

export interface CabalStanza {
  readonly type: StanzaType;
  /** Null for the main library and for unnamed sections. */
  readonly name: string | null;
  /** Field name (lower-cased) to the text of each occurrence. */
  readonly fields: ReadonlyMap<string, readonly string[]>;
}

export interface CabalFile {
  /** Top-level fields: `name`, `version`, `cabal-version`... */
  readonly fields: ReadonlyMap<string, readonly string[]>;
  readonly stanzas: readonly CabalStanza[];
}

// =============================================================================
// Parsing
// =============================================================================

const FIELD_LINE = /^([A-Za-z][A-Za-z0-9_-]*)\s*:\s*(.*)$/;

const STANZA_TYPES: ReadonlySet<string> = new Set<StanzaType>([
  "library",
  "executable",
  "test-suite",
  "benchmark",
  "common",
  "foreign-library",
  "flag",
  "source-repository",
  "custom-setup",
]);

function isStanzaType(word: string): word is StanzaType {
  return STANZA_TYPES.has(word);
}

function toStanzaType(word: string): StanzaType {
  return isStanzaType(word) ? word : "unknown";
}

interface MutableFields {
  readonly fields: Map<string, string[]>;
}

function addField(target: MutableFields, name: string, value: string): void {
  const existing = target.fields.get(name);
  if (existing) {
    existing.push(value);
  } else {
    target.fields.set(name, [value]);
  }
}

function indentOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].length : 0;
}

export function parseCabalFile(content: string): CabalFile {
  const top: MutableFields = { fields: new Map() };
  const stanzas: { type: StanzaType; name: string | null; fields: Map<string, string[]> }[] = [];

  let target: MutableFields = top;
  let openField: { name: string; indent: number; values: string[] } | null = null;

  for (const raw of content.split(/\r?\n/)) {
    const text = raw.trim();
    if (text === "" || text.startsWith("--")) continue;
    const indent = indentOf(raw);

    if (openField && indent > openField.indent) {
      const last = openField.values.length - 1;
      openField.values[last] = `${openField.values[last]}\n${text}`;
      continue;
    }
    openField = null;

    const field = FIELD_LINE.exec(text);

    if (indent === 0 && !field) {
      const [word = "", ...rest] = text.split(/\s+/);
      const name = rest.join(" ").trim();
      const stanza = {
        type: toStanzaType(word.toLowerCase()),
        name: name === "" ? null : name,
        fields: new Map<string, string[]>(),
      };
      stanzas.push(stanza);
      target = stanza;
      continue;
    }

    if (/^(if\s|else\b)/i.test(text) || text === "{" || text === "}") {
      continue;
    }

    if (field) {
      const [, fieldName = "", value = ""] = field;
      if (indent === 0) target = top;
      const name = fieldName.toLowerCase();
      addField(target, name, value.trim());
      const values = target.fields.get(name);
      if (values) openField = { name, indent, values };
    }
  }

  return { fields: top.fields, stanzas };
}

// =============================================================================
// Field access
// =============================================================================

/** Split a comma- and/or whitespace-separated list, dropping quotes. */
export function splitList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((item) => item.replace(/^"(.*)"$/, "$1"))
    .filter((item) => item.length > 0);
}

/** Split on whitespace only; option values may contain commas. */
export function splitWords(value: string): string[] {
  return value
    .split(/\s+/)
    .map((item) => item.replace(/^"(.*)"$/, "$1"))
    .filter((item) => item.length > 0);
}

function stanzaFieldValues(file: CabalFile, stanza: CabalStanza, name: string, seen: Set<CabalStanza>): string[] {
  if (seen.has(stanza)) return [];
  seen.add(stanza);

  const values: string[] = [];
  for (const imported of (stanza.fields.get("import") ?? []).flatMap(splitList)) {
    const common = file.stanzas.find((s) => s.type === "common" && s.name === imported);
    if (common) values.push(...stanzaFieldValues(file, common, name, seen));
  }
  values.push(...(stanza.fields.get(name) ?? []));
  return values;
}

/** Every occurrence of `name` in the stanza, imported common stanzas first. */
export function fieldValues(file: CabalFile, stanza: CabalStanza, name: string): string[] {
  return stanzaFieldValues(file, stanza, name, new Set());
}

export function packageName(file: CabalFile): string | null {
  const value = file.fields.get("name")?.[0]?.trim();
  return value ? value : null;
}

// =============================================================================
// Units and components
// =============================================================================

const UNIT_KIND_BY_STANZA: Partial<Record<StanzaType, UnitKind>> = {
  library: "lib",
  executable: "exe",
  "test-suite": "test",
  benchmark: "bench",
};

function unitIdFor(kind: UnitKind, stanza: CabalStanza, pkgName: string): string {
  return `${kind}:${stanza.name ?? pkgName}`;
}

export function listUnits(file: CabalFile, pkgName: string): UnitRef[] {
  const units: UnitRef[] = [];
  for (const stanza of file.stanzas) {
    const kind = UNIT_KIND_BY_STANZA[stanza.type];
    if (!kind) continue;
    units.push({ id: unitIdFor(kind, stanza, pkgName), packageName: pkgName, kind });
  }
  return units;
}

function entrypointFor(file: CabalFile, stanza: CabalStanza): ComponentEntrypoint {
  const list = (name: string): string[] => fieldValues(file, stanza, name).flatMap(splitList);
  const otherModules = list("other-modules");
  const mainIs = list("main-is")[0];

  switch (stanza.type) {
    case "library":
      return { kind: "library", exposedModules: list("exposed-modules"), otherModules };
    case "test-suite":
      // detailed test suites name a module instead of a main file
      if (mainIs === undefined) {
        return { kind: "library", exposedModules: list("test-module"), otherModules };
      }
      return { kind: "executable", mainIs, otherModules };
    default:
      return { kind: "executable", mainIs: mainIs ?? "", otherModules };
  }
}

export function componentFor(file: CabalFile, stanza: CabalStanza, unitId: string): ComponentInfo {
  const sourceDirs = [
    ...fieldValues(file, stanza, "hs-source-dirs"),
    ...fieldValues(file, stanza, "hs-source-dir"),
  ].flatMap(splitList);
  const effectiveDirs = sourceDirs.length > 0 ? sourceDirs : ["."];

  const flags = [
    ...effectiveDirs.map((dir) => `-i${dir}`),
    ...fieldValues(file, stanza, "ghc-options").flatMap(splitWords),
    ...fieldValues(file, stanza, "default-extensions").flatMap(splitList).map((ext) => `-X${ext}`),
  ];

  return {
    name: unitId,
    sourceDirs: effectiveDirs,
    entrypoint: entrypointFor(file, stanza),
    flags,
  };
}

/** Components of the unit `unit`, or `[]` when the file no longer declares it. */
export function componentsForUnit(file: CabalFile, unit: UnitRef): ComponentInfo[] {
  for (const stanza of file.stanzas) {
    const kind = UNIT_KIND_BY_STANZA[stanza.type];
    if (kind === unit.kind && unitIdFor(kind, stanza, unit.packageName) === unit.id) {
      return [componentFor(file, stanza, unit.id)];
    }
  }
  return [];
}

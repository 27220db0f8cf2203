import semver from "semver";
import { DEPENDENCY_SECTIONS, ManifestError, VersionError } from "@monoweave/contracts";
import type { DependencySection } from "@monoweave/contracts";
import type { FileSystem } from "@monoweave/adapters";

export type ManifestModification =
  | { op: "set-version"; from: string; to: string }
  | { op: "add-dependency"; section: DependencySection; name: string; spec: string }
  | { op: "update-dependency"; section: DependencySection; name: string; from: string; to: string }
  | { op: "remove-dependency"; section: DependencySection; name: string; from: string }
  | { op: "update-script"; name: string; from?: string; to: string }
  | { op: "set-field"; field: string; value: unknown };

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function detectIndent(text: string): string | number {
  const match = /^\{\s*\n([ \t]+)"/.exec(text);
  return match?.[1] ?? 2;
}

/**
 * Edits one package.json in memory. Every change is recorded as a
 * modification; save() writes the document back with its key order,
 * indentation and trailing newline intact.
 */
export class ManifestEditor {
  private readonly mods: ManifestModification[] = [];

  private constructor(
    readonly path: string,
    private readonly doc: JsonObject,
    private readonly indent: string | number,
    private readonly trailingNewline: boolean,
  ) {}

  static fromText(path: string, text: string): ManifestEditor {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ManifestError(`Cannot parse ${path}`, { code: "ERR_MANIFEST_PARSE", cause: error, path });
    }
    if (!isRecord(json)) {
      throw new ManifestError(`${path} is not a JSON object`, { code: "ERR_MANIFEST_PARSE", path });
    }
    return new ManifestEditor(path, json, detectIndent(text), text.endsWith("\n"));
  }

  static async load(fs: FileSystem, path: string): Promise<ManifestEditor> {
    return ManifestEditor.fromText(path, await fs.readFile(path));
  }

  get name(): string | undefined {
    return typeof this.doc.name === "string" ? this.doc.name : undefined;
  }

  get version(): string | undefined {
    return typeof this.doc.version === "string" ? this.doc.version : undefined;
  }

  modifications(): readonly ManifestModification[] {
    return this.mods;
  }

  isDirty(): boolean {
    return this.mods.length > 0;
  }

  setVersion(version: string): this {
    if (semver.valid(version) === null) {
      throw new VersionError(`Cannot set invalid version "${version}" in ${this.path}`, { packageName: this.name });
    }
    const from = this.version ?? "";
    if (from === version) { return this; }
    this.doc.version = version;
    this.mods.push({ op: "set-version", from, to: version });
    return this;
  }

  /** Sections of the manifest that declare dep. */
  sectionsOf(dep: string): DependencySection[] {
    return DEPENDENCY_SECTIONS.filter((section) => {
      const map = this.doc[section];
      return isRecord(map) && typeof map[dep] === "string";
    });
  }

  dependency(section: DependencySection, dep: string): string | undefined {
    const map = this.doc[section];
    if (!isRecord(map)) { return undefined; }
    const spec = map[dep];
    return typeof spec === "string" ? spec : undefined;
  }

  addDependency(section: DependencySection, dep: string, spec: string): this {
    const current = this.doc[section];
    const map: JsonObject = isRecord(current) ? current : {};
    map[dep] = spec;
    this.doc[section] = map;
    this.mods.push({ op: "add-dependency", section, name: dep, spec });
    return this;
  }

  /** Returns false when the section does not declare dep. */
  updateDependency(section: DependencySection, dep: string, spec: string): boolean {
    const map = this.doc[section];
    const from = this.dependency(section, dep);
    if (!isRecord(map) || from === undefined) { return false; }
    if (from !== spec) {
      map[dep] = spec;
      this.mods.push({ op: "update-dependency", section, name: dep, from, to: spec });
    }
    return true;
  }

  removeDependency(section: DependencySection, dep: string): boolean {
    const map = this.doc[section];
    const from = this.dependency(section, dep);
    if (!isRecord(map) || from === undefined) { return false; }
    delete map[dep];
    this.mods.push({ op: "remove-dependency", section, name: dep, from });
    return true;
  }

  updateScript(name: string, command: string): this {
    const current = this.doc.scripts;
    const scripts: JsonObject = isRecord(current) ? current : {};
    const from = scripts[name];
    scripts[name] = command;
    this.doc.scripts = scripts;
    this.mods.push({ op: "update-script", name, from: typeof from === "string" ? from : undefined, to: command });
    return this;
  }

  setField(field: string, value: unknown): this {
    this.doc[field] = value;
    this.mods.push({ op: "set-field", field, value });
    return this;
  }

  toString(): string {
    const body = JSON.stringify(this.doc, null, this.indent);
    return this.trailingNewline ? body + "\n" : body;
  }

  /** Writes the document when it has modifications; returns whether it wrote. */
  async save(fs: FileSystem): Promise<boolean> {
    if (!this.isDirty()) { return false; }
    await fs.writeFile(this.path, this.toString());
    return true;
  }
}

import type { EntryFields, RawEntry } from "../reconcile/domain/models/reconciliation.ts";

/** A block the reader gave up on. `raw` is its source text, kept for writing back. */
export interface BibtexParseError {
  line: number;
  entryType: string;
  entryId: string | null;
  message: string;
  raw: string;
}

export interface BibtexParseResult {
  entries: RawEntry[];
  errors: BibtexParseError[];
  warnings: string[];
}

export interface SerializeOptions {
  sortByKey?: boolean;
  indent?: string;
}

const MONTH_MACROS: Record<string, string> = {
  jan: "January",
  feb: "February",
  mar: "March",
  apr: "April",
  may: "May",
  jun: "June",
  jul: "July",
  aug: "August",
  sep: "September",
  oct: "October",
  nov: "November",
  dec: "December",
};

const FIELD_ORDER = [
  "author",
  "editor",
  "title",
  "journal",
  "booktitle",
  "year",
  "month",
  "volume",
  "number",
  "pages",
  "publisher",
  "organization",
  "address",
  "doi",
  "url",
  "eprint",
  "archiveprefix",
  "primaryclass",
  "issn",
  "isbn",
  "abstract",
  "keywords",
  "note",
];

class BibtexSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BibtexSyntaxError";
  }
}

const IDENT = /[^\s"#%'(),={}]+/y;
const ENTRY_TYPE = /[A-Za-z][\w-]*/y;

class BibtexReader {
  private pos = 0;
  private readonly macros = new Map<string, string>(Object.entries(MONTH_MACROS));
  private readonly seenKeys = new Set<string>();
  readonly entries: RawEntry[] = [];
  readonly errors: BibtexParseError[] = [];
  readonly warnings: string[] = [];

  constructor(private readonly text: string) {}

  run(): void {
    while (this.pos < this.text.length) {
      const at = this.text.indexOf("@", this.pos);
      if (at < 0) return;
      this.pos = at + 1;

      const type = this.matchSticky(ENTRY_TYPE);
      if (!type) continue;
      this.skipWhitespace();
      const open = this.text[this.pos];
      if (open !== "{" && open !== "(") continue;
      this.pos += 1;
      const close = open === "{" ? "}" : ")";
      const kind = type.toLowerCase();

      let entryId: string | null = null;
      try {
        if (kind === "comment" || kind === "preamble") {
          this.skipBalanced(close);
        } else if (kind === "string") {
          this.readMacroDefinition(close);
        } else {
          entryId = this.readEntryKey(close);
          this.readEntry(kind, entryId, close);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.resync(at);
        this.errors.push({
          line: this.lineAt(at),
          entryType: kind,
          entryId,
          message,
          raw: this.text.slice(at, this.pos).trimEnd(),
        });
      }
    }
  }

  private readEntryKey(close: string): string {
    this.skipWhitespace();
    const start = this.pos;
    while (this.pos < this.text.length && this.text[this.pos] !== "," && this.text[this.pos] !== close) {
      if (this.text[this.pos] === "\n") break;
      this.pos += 1;
    }
    const key = this.text.slice(start, this.pos).trim();
    if (!key || /\s/.test(key)) {
      throw new BibtexSyntaxError("missing or invalid citation key");
    }
    return key;
  }

  private readEntry(entryType: string, entryId: string, close: string): void {
    const fields: EntryFields = {};

    while (true) {
      this.skipWhitespace();
      const ch = this.text[this.pos];
      if (ch === undefined) throw new BibtexSyntaxError(`unterminated entry "${entryId}"`);
      if (ch === close) {
        this.pos += 1;
        break;
      }
      if (ch === ",") {
        this.pos += 1;
        continue;
      }

      const rawName = this.matchSticky(IDENT);
      if (!rawName) throw new BibtexSyntaxError(`unexpected "${ch}" in entry "${entryId}"`);
      const name = rawName.toLowerCase();
      this.skipWhitespace();
      if (this.text[this.pos] !== "=") {
        throw new BibtexSyntaxError(`expected "=" after field "${name}" in entry "${entryId}"`);
      }
      this.pos += 1;
      const value = this.readValue();

      if (name in fields) {
        this.warnings.push(`${entryId}: duplicate field "${name}" ignored`);
        continue;
      }
      fields[name] = value;
    }

    if (this.seenKeys.has(entryId)) {
      this.warnings.push(`${entryId}: duplicate citation key ignored`);
      return;
    }
    this.seenKeys.add(entryId);
    this.entries.push({ entryId, entryType, fields });
  }

  private readMacroDefinition(close: string): void {
    this.skipWhitespace();
    const name = this.matchSticky(IDENT);
    if (!name) throw new BibtexSyntaxError("@string without a name");
    this.skipWhitespace();
    if (this.text[this.pos] !== "=") throw new BibtexSyntaxError(`expected "=" in @string ${name}`);
    this.pos += 1;
    const value = this.readValue();
    this.skipWhitespace();
    if (this.text[this.pos] !== close) throw new BibtexSyntaxError(`unterminated @string ${name}`);
    this.pos += 1;
    this.macros.set(name.toLowerCase(), value);
  }

  private readValue(): string {
    const parts: string[] = [];
    while (true) {
      this.skipWhitespace();
      parts.push(this.readValuePart());
      this.skipWhitespace();
      if (this.text[this.pos] !== "#") break;
      this.pos += 1;
    }
    return parts.join("").replace(/\s+/g, " ").trim();
  }

  private readValuePart(): string {
    const ch = this.text[this.pos];
    if (ch === "{") {
      this.pos += 1;
      const start = this.pos;
      this.skipBalanced("}");
      return this.text.slice(start, this.pos - 1);
    }
    if (ch === "\"") {
      this.pos += 1;
      const start = this.pos;
      let depth = 0;
      while (this.pos < this.text.length) {
        const c = this.text[this.pos];
        if (c === "{") depth += 1;
        else if (c === "}") depth -= 1;
        else if (c === "\"" && depth === 0 && this.text[this.pos - 1] !== "\\") break;
        this.pos += 1;
      }
      if (this.pos >= this.text.length) throw new BibtexSyntaxError("unterminated quoted value");
      this.pos += 1;
      return this.text.slice(start, this.pos - 1);
    }
    const token = this.matchSticky(IDENT);
    if (!token) throw new BibtexSyntaxError(`unexpected "${ch ?? "end of input"}" where a value was expected`);
    if (/^\d+$/.test(token)) return token;
    const macro = this.macros.get(token.toLowerCase());
    if (macro === undefined) {
      this.warnings.push(`undefined macro "${token}" kept verbatim`);
      return token;
    }
    return macro;
  }

  private skipBalanced(close: string): void {
    let depth = 0;
    while (this.pos < this.text.length) {
      const c = this.text[this.pos];
      this.pos += 1;
      if (c === "{") depth += 1;
      else if (c === "}" && depth > 0) depth -= 1;
      else if (c === close && depth === 0) return;
    }
    throw new BibtexSyntaxError("unbalanced braces");
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos] ?? "")) this.pos += 1;
  }

  private matchSticky(pattern: RegExp): string | null {
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.text);
    if (!match) return null;
    this.pos = pattern.lastIndex;
    return match[0];
  }

  private resync(from: number): void {
    const next = this.text.indexOf("\n@", from + 1);
    this.pos = next < 0 ? this.text.length : next + 1;
  }

  private lineAt(offset: number): number {
    let line = 1;
    for (let i = 0; i < offset; i += 1) {
      if (this.text.charCodeAt(i) === 10) line += 1;
    }
    return line;
  }
}

const NON_ENTRY_TYPES = new Set(["comment", "preamble", "string"]);

/** True when the failed block was a reference rather than a macro or comment. */
export function isEntryError(error: BibtexParseError): boolean {
  return !NON_ENTRY_TYPES.has(error.entryType);
}

export function parseBibtex(text: string): BibtexParseResult {
  const reader = new BibtexReader(text);
  reader.run();
  return { entries: reader.entries, errors: reader.errors, warnings: reader.warnings };
}

function orderedFieldNames(fields: EntryFields): string[] {
  const names = Object.keys(fields);
  const rank = (name: string) => {
    const index = FIELD_ORDER.indexOf(name);
    return index < 0 ? FIELD_ORDER.length : index;
  };
  return names.sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

// Unmatched braces would corrupt everything after the field.
function balanceBraces(value: string): string {
  let depth = 0;
  let out = "";
  for (const c of value) {
    if (c === "}") {
      if (depth === 0) continue;
      depth -= 1;
    } else if (c === "{") {
      depth += 1;
    }
    out += c;
  }
  return out + "}".repeat(depth);
}

export function serializeEntry(entry: RawEntry, indent = "  "): string {
  const lines = [`@${entry.entryType}{${entry.entryId},`];
  const names = orderedFieldNames(entry.fields).filter((name) => (entry.fields[name] ?? "").trim() !== "");
  names.forEach((name, idx) => {
    const separator = idx === names.length - 1 ? "" : ",";
    lines.push(`${indent}${name} = {${balanceBraces(entry.fields[name] ?? "")}}${separator}`);
  });
  lines.push("}");
  return lines.join("\n");
}

export function serializeBibtex(entries: RawEntry[], options: SerializeOptions = {}): string {
  const ordered = options.sortByKey ?? true
    ? [...entries].sort((a, b) => a.entryId.localeCompare(b.entryId))
    : entries;
  if (ordered.length === 0) return "";
  return `${ordered.map((entry) => serializeEntry(entry, options.indent)).join("\n\n")}\n`;
}

/** Serialized entries followed by the blocks that failed to parse, untouched. */
export function serializeWithVerbatim(
  entries: RawEntry[],
  verbatim: readonly string[],
  options: SerializeOptions = {},
): string {
  const blocks = [serializeBibtex(entries, options).trimEnd(), ...verbatim].filter((block) => block !== "");
  return blocks.length === 0 ? "" : `${blocks.join("\n\n")}\n`;
}

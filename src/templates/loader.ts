/**
 * Document template loader.
 *
 * Finds template files by name, reads and compiles them.
 *
 * USAGE:
 *
 *   const loader = new TemplateLoader({
 *     builtinDir: config.templatesDir,
 *     userDir: config.userTemplatesDir,
 *     cache: new TemplateCache(),
 *   });
 *
 *   const template = loader.load("document-markdown");   // extension optional
 *   const available = loader.list();                     // name → path
 *
 * LOOKUP ORDER:
 *
 *   1. A name containing a path separator is a file path and is read as is
 *   2. <userDir>/<name>   — user templates override built-ins
 *   3. <builtinDir>/<name>
 *
 * A name without an extension matches "<name>.txt", then "<name>.md", in
 * each directory; this is also the name list() reports. Compiled templates
 * are cached only when a TemplateCache is supplied.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { basename, extname, join, resolve, sep } from "node:path";

import { parseTemplate, type CompiledTemplate } from "./parser.js";
import type { TemplateCache } from "./cache.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** File extensions recognized as document templates. */
const TEMPLATE_EXTENSIONS = new Set([".txt", ".md"]);

/** Extension added by save() to names given without one. */
const DEFAULT_EXTENSION = ".txt";

function isTemplateFile(path: string): boolean {
  return (
    TEMPLATE_EXTENSIONS.has(extname(path).toLowerCase()) &&
    statSync(path).isFile()
  );
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export interface TemplateLoaderOptions {
  /** Directory of templates shipped with the application. Must exist. */
  builtinDir: string;
  /** Directory of user templates. May not exist yet. */
  userDir?: string;
  /** Opt-in compile cache shared across loads. */
  cache?: TemplateCache;
}

export class TemplateLoader {
  readonly builtinDir: string;
  readonly userDir: string | undefined;
  private readonly cache: TemplateCache | undefined;

  constructor(options: TemplateLoaderOptions) {
    this.builtinDir = resolve(options.builtinDir);
    this.userDir = options.userDir !== undefined ? resolve(options.userDir) : undefined;
    this.cache = options.cache;

    if (!existsSync(this.builtinDir)) {
      throw new TemplateLoadError(
        this.builtinDir,
        `Template directory does not exist: ${this.builtinDir}`
      );
    }
  }

  /**
   * Resolve a template name to the file that would be loaded.
   *
   * @throws TemplateLoadError if no file matches
   */
  locate(name: string): string {
    if (name.includes("/") || name.includes(sep)) {
      const direct = resolve(name);
      if (!existsSync(direct)) {
        throw new TemplateLoadError(direct, `Template file not found: ${direct}`);
      }
      return direct;
    }

    // a bare name matches any template extension, ".txt" first
    const filenames =
      extname(name) === "" ? [...TEMPLATE_EXTENSIONS].map((ext) => `${name}${ext}`) : [name];
    const dirs = this.userDir !== undefined ? [this.userDir, this.builtinDir] : [this.builtinDir];

    for (const dir of dirs) {
      for (const filename of filenames) {
        const candidate = join(dir, filename);
        if (existsSync(candidate)) {
          return candidate;
        }
      }
    }

    throw new TemplateLoadError(
      name,
      `Template not found: ${filenames.join(" or ")} (searched ${dirs.join(", ")})`
    );
  }

  /**
   * Load and compile a template.
   *
   * @param name - Template name ("document-markdown"), filename, or path
   * @throws TemplateLoadError    if the file is missing or not a template
   * @throws TemplateSyntaxError  if the template is malformed
   */
  load(name: string): CompiledTemplate {
    const filePath = this.locate(name);

    const ext = extname(filePath).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const source = readFileSync(filePath, "utf-8");
    const templateName = basename(filePath, extname(filePath));

    return this.cache
      ? this.cache.compile(filePath, source, templateName)
      : parseTemplate(source, templateName);
  }

  /**
   * Available templates as name (without extension) → path. A user
   * template hides a built-in of the same name.
   */
  list(): Map<string, string> {
    const found = new Map<string, string>();
    const dirs = this.userDir !== undefined ? [this.builtinDir, this.userDir] : [this.builtinDir];

    for (const dir of dirs) {
      if (!existsSync(dir)) continue;
      for (const entry of readdirSync(dir).sort()) {
        const fullPath = join(dir, entry);
        if (!isTemplateFile(fullPath)) continue;
        found.set(basename(entry, extname(entry)), fullPath);
      }
    }

    return found;
  }

  /**
   * Load every available template.
   *
   * @throws TemplateSyntaxError if any template is malformed
   */
  loadAll(): Map<string, CompiledTemplate> {
    const result = new Map<string, CompiledTemplate>();
    for (const [name, path] of this.list()) {
      result.set(name, this.load(path));
    }
    return result;
  }

  /**
   * Compile `source` and, if it is well-formed, write it to the user
   * template directory.
   *
   * @returns The path written
   * @throws TemplateSyntaxError if the source is malformed (nothing is written)
   * @throws TemplateLoadError   if the loader has no user directory
   */
  save(name: string, source: string): string {
    if (this.userDir === undefined) {
      throw new TemplateLoadError(name, `No user template directory configured; cannot save "${name}"`);
    }

    if (name.includes("/") || name.includes(sep)) {
      throw new TemplateLoadError(name, `Template name must not contain a path: "${name}"`);
    }

    const filename = extname(name) === "" ? `${name}${DEFAULT_EXTENSION}` : name;
    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filename,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    parseTemplate(source, basename(filename, ext));

    mkdirSync(this.userDir, { recursive: true });
    const filePath = join(this.userDir, filename);
    writeFileSync(filePath, source, "utf-8");
    this.cache?.delete(filePath);
    return filePath;
  }
}

import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { isMap, isScalar, parseDocument } from "yaml";
import { configMalformed, configNotFound, entryNotFound } from "./errors/catalog.js";
import { createNoopLogger, type Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One help page descriptor */
export interface CatalogEntry {
  /** Output file base name; unique within a catalog */
  id: string;
  category: string;
  name: string;
  url: string;
  /** Display order within the category, used by `list` */
  order?: number;
}

export type ExclusionReason = "missing-url" | "unsafe-id" | "duplicate-id";

/** An entry that was dropped while loading, kept for reporting */
export interface ExcludedEntry {
  id: string;
  reason: ExclusionReason;
  /** 1-based position in the source file */
  position: number;
}

export interface Catalog {
  entries: readonly CatalogEntry[];
  excluded: readonly ExcludedEntry[];
}

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const TextSchema = z.union([z.string(), z.number()]).transform(String);
const OptionalTextSchema = TextSchema.nullish();

/** Fields shared by both catalog shapes; `detailUrl`/`helpCategoryId` come from the game's export */
const EntryFieldsSchema = z.object({
  category: OptionalTextSchema,
  helpCategoryId: OptionalTextSchema,
  name: OptionalTextSchema,
  url: z.string().nullish(),
  detailUrl: z.string().nullish(),
  order: z.number().nullish(),
});

/** `- id: ...` items */
const SequenceCatalogSchema = z.array(EntryFieldsSchema.extend({ id: TextSchema }));

/** `some-id: { ... }` mappings; an empty value is an entry without a URL */
const MappingCatalogSchema = z.record(z.string(), EntryFieldsSchema.nullable());

type EntryFields = z.infer<typeof EntryFieldsSchema>;

const EXCLUSION_TEXT: Record<ExclusionReason, string> = {
  "missing-url": "entry has no url",
  "unsafe-id": "id is empty or not usable as a file name",
  "duplicate-id": "id appears earlier in the catalog",
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * True when the id can be used verbatim as a file base name inside the
 * output directory.
 */
export function isSafeId(id: string): boolean {
  if (id.trim() === "") return false;
  if (id === "." || id === "..") return false;
  return !/[/\\\0]/.test(id);
}

function toEntry(id: string, fields: EntryFields | null): CatalogEntry {
  return {
    id,
    category: fields?.category ?? fields?.helpCategoryId ?? "",
    name: fields?.name ?? "",
    url: (fields?.url ?? fields?.detailUrl ?? "").trim(),
    ...(fields?.order != null && { order: fields.order }),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
  );
}

/**
 * Plain objects put integer-like keys first, so mapping order is taken
 * from the YAML document itself.
 */
function parseRoot(path: string, parsed: unknown, keyOrder: string[]): CatalogEntry[] {
  if (parsed === null || parsed === undefined) {
    throw configMalformed(path, ["catalog is empty"]);
  }

  if (Array.isArray(parsed)) {
    const result = SequenceCatalogSchema.safeParse(parsed);
    if (!result.success) throw configMalformed(path, formatIssues(result.error));
    return result.data.map((item) => toEntry(item.id, item));
  }

  if (typeof parsed === "object") {
    const result = MappingCatalogSchema.safeParse(parsed);
    if (!result.success) throw configMalformed(path, formatIssues(result.error));
    return keyOrder.map((id) => toEntry(id, result.data[id] ?? null));
  }

  throw configMalformed(path, ["expected a mapping of id → entry or a list of entries"]);
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Apply the catalog invariants to raw entries, in source order.
 * First occurrence of an id wins, even when that occurrence is itself excluded.
 */
export function buildCatalog(raw: readonly CatalogEntry[], logger: Logger = createNoopLogger()): Catalog {
  const entries: CatalogEntry[] = [];
  const excluded: ExcludedEntry[] = [];
  const seen = new Set<string>();

  raw.forEach((entry, index) => {
    let reason: ExclusionReason | undefined;
    if (!isSafeId(entry.id)) {
      reason = "unsafe-id";
    } else if (seen.has(entry.id)) {
      reason = "duplicate-id";
    } else {
      seen.add(entry.id);
      if (entry.url === "") reason = "missing-url";
    }

    if (reason) {
      excluded.push({ id: entry.id, reason, position: index + 1 });
      logger.warn(`Excluding catalog entry: ${EXCLUSION_TEXT[reason]}`, {
        id: entry.id,
        position: index + 1,
      });
      return;
    }
    entries.push(entry);
  });

  return { entries, excluded };
}

/**
 * Read a catalog file into an ordered, de-duplicated list of entries.
 * Throws CONFIG_NOT_FOUND or CONFIG_MALFORMED.
 */
export function loadCatalog(path: string, logger: Logger = createNoopLogger()): Catalog {
  if (!existsSync(path)) {
    throw configNotFound(path);
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw configMalformed(path, [`cannot read file: ${(err as Error).message}`]);
  }

  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw configMalformed(path, doc.errors.map((e) => `invalid YAML: ${e.message}`));
  }

  const parsed: unknown = doc.toJS();
  const keyOrder = isMap(doc.contents)
    ? doc.contents.items.map((pair) => String(isScalar(pair.key) ? pair.key.value : pair.key))
    : [];

  const catalog = buildCatalog(parseRoot(path, parsed, keyOrder), logger);
  logger.debug("Catalog loaded", {
    path,
    entries: catalog.entries.length,
    excluded: catalog.excluded.length,
  });
  return catalog;
}

/**
 * Narrow a catalog to the entry with the given id.
 * Throws ENTRY_NOT_FOUND, naming the exclusion reason when the id was dropped.
 */
export function selectEntry(catalog: Catalog, id: string): CatalogEntry {
  const entry = catalog.entries.find((e) => e.id === id);
  if (entry) return entry;

  const dropped = catalog.excluded.find((e) => e.id === id);
  throw entryNotFound(id, dropped ? EXCLUSION_TEXT[dropped.reason] : undefined);
}

/**
 * Group entries by category for listing.
 * Categories sort by name; entries sort by `order`, ties keep catalog order.
 */
export function groupByCategory(
  entries: readonly CatalogEntry[]
): Array<{ category: string; entries: CatalogEntry[] }> {
  const groups = new Map<string, CatalogEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.category);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.category, [entry]);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([category, items]) => ({
      category,
      entries: [...items].sort((a, b) => (a.order ?? 0) - (b.order ?? 0)),
    }));
}

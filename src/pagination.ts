// src/pagination.ts
import { z } from "zod";
import { describeRequestError } from "./errors";

export const DEFAULT_PAGE_SIZE = 1000;

export type QueryParams = Record<string, string | number>;

/** Issues one GET and returns the parsed body. */
export type PageRequester = (path: string, params: QueryParams) => Promise<unknown>;

/**
 * The three list envelopes the API hands back, plus anything else.
 *  - cursor: { results: [...], cursor: "token" | { name: "token", ... } }
 *  - items:  { items: [...] }
 *  - array:  [...]
 */
export type PageEnvelope =
  | { kind: "cursor"; items: unknown[]; cursor: string | null }
  | { kind: "items"; items: unknown[] }
  | { kind: "array"; items: unknown[] }
  | { kind: "unknown" };

export type Continuation = { cursor: string } | { after: number };

const cursorTokenSchema = z
  .union([z.string(), z.object({ name: z.string().nullish() }).passthrough()])
  .nullish();

const cursorEnvelopeSchema = z
  .object({ results: z.array(z.unknown()), cursor: cursorTokenSchema })
  .passthrough();

const itemsEnvelopeSchema = z.object({ items: z.array(z.unknown()) }).passthrough();

const bareArraySchema = z.array(z.unknown());

function cursorToken(raw: z.infer<typeof cursorTokenSchema>): string | null {
  if (!raw) return null;
  const token = typeof raw === "string" ? raw : raw.name;
  return token ? token : null;
}

export function decodePage(body: unknown): PageEnvelope {
  const array = bareArraySchema.safeParse(body);
  if (array.success) {
    return { kind: "array", items: array.data };
  }

  const cursor = cursorEnvelopeSchema.safeParse(body);
  if (cursor.success) {
    return {
      kind: "cursor",
      items: cursor.data.results,
      cursor: cursorToken(cursor.data.cursor),
    };
  }

  const items = itemsEnvelopeSchema.safeParse(body);
  if (items.success) {
    return { kind: "items", items: items.data.items };
  }

  return { kind: "unknown" };
}

export function lastItemId(items: unknown[]): number | null {
  const last = items[items.length - 1];
  if (typeof last !== "object" || last === null || !("id" in last)) return null;
  return typeof last.id === "number" ? last.id : null;
}

/**
 * Where the next request should continue from, or null when the listing
 * is complete. A cursor always wins; otherwise a short page ends the
 * listing and a full page continues after the last item's id.
 */
export function nextContinuation(page: PageEnvelope, pageSize: number): Continuation | null {
  if (page.kind === "unknown") return null;

  if (page.kind === "cursor" && page.cursor && page.items.length > 0) {
    return { cursor: page.cursor };
  }

  if (page.items.length < pageSize) return null;

  const after = lastItemId(page.items);
  return after === null ? null : { after };
}

/** Cursor names may repeat while the server moves its offset, so only after-ids are compared. */
function afterIdStalled(previous: Continuation | null, next: Continuation): boolean {
  if (!previous || !("after" in previous) || !("after" in next)) return false;
  return previous.after === next.after;
}

export interface FetchAllOptions {
  pageSize?: number;
  /** Sent with every page request, e.g. a device filter. */
  params?: QueryParams;
}

/**
 * Fetch every page of a list endpoint. Items that do not match `schema`
 * are dropped with a warning. A failed request ends the listing and the
 * items collected so far are returned.
 */
export async function fetchAllPages<T>(
  request: PageRequester,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchAllOptions = {}
): Promise<T[]> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const all: T[] = [];
  let continuation: Continuation | null = null;
  let page = 1;

  while (true) {
    const params: QueryParams = { ...options.params, pageSize, ...continuation };

    let body: unknown;
    try {
      body = await request(path, params);
    } catch (err) {
      console.error(
        `⚠️  ${path} page ${page} failed: ${describeRequestError(err)}. Continuing with ${all.length} item(s) fetched so far.`
      );
      return all;
    }

    const envelope = decodePage(body);
    if (envelope.kind === "unknown") {
      console.warn(`⚠️  ${path} page ${page}: unrecognised response shape, stopping.`);
      return all;
    }

    for (const raw of envelope.items) {
      const parsed = schema.safeParse(raw);
      if (parsed.success) {
        all.push(parsed.data);
      } else {
        console.warn(`⚠️  ${path}: skipping malformed item: ${JSON.stringify(raw)}`);
      }
    }

    const next = nextContinuation(envelope, pageSize);
    if (!next) {
      if (envelope.items.length >= pageSize) {
        console.warn(`⚠️  ${path}: last item has no id, results may be truncated.`);
      }
      break;
    }

    if (afterIdStalled(continuation, next)) {
      console.warn(`⚠️  ${path}: continuation did not advance, stopping.`);
      break;
    }

    continuation = next;
    page += 1;
  }

  return all;
}

/**
 * Elasticsearch REST client: scroll retrieval and scripted bulk updates
 *
 * Talks to the plain HTTP API through undici so TLS verification and a
 * private CA can be set per connection.
 */

import { readFileSync } from "node:fs";
import { Agent, fetch as undiciFetch, type Response } from "undici";
import { z } from "zod";
import { ConfigurationError, StoreRequestError, describeError } from "../errors.js";
import type {
  BulkItemResult,
  DocumentStore,
  ScrollPage,
  ScrollRequest,
  UpdateAction,
} from "./store.js";

// =============================================================================
// Options
// =============================================================================

export type ElasticsearchOptions = {
  baseUrl: string;
  user?: string;
  password?: string;
  apiKey?: string;
  bearer?: string;
  caCertPath?: string;
  verifyTls: boolean;
  timeoutMs: number;
  fetchImpl?: typeof undiciFetch;
};

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

// =============================================================================
// Response Shapes
// =============================================================================

const SearchResponseSchema = z.object({
  _scroll_id: z.string().optional(),
  hits: z
    .object({
      hits: z.array(
        z.object({
          _id: z.string(),
          _index: z.string().optional(),
          _source: z.record(z.unknown()).optional(),
        }),
      ),
    })
    .optional(),
});

const BulkItemSchema = z.object({
  _id: z.string().optional(),
  status: z.number(),
  error: z.unknown().optional(),
});

const BulkResponseSchema = z.object({
  errors: z.boolean().optional(),
  items: z.array(z.record(BulkItemSchema)),
});

function describeBulkError(error: unknown): string {
  if (error && typeof error === "object" && "reason" in error) {
    const type = "type" in error && typeof error.type === "string" ? `${error.type}: ` : "";
    return `${type}${String(error.reason)}`;
  }
  return typeof error === "string" ? error : JSON.stringify(error);
}

// =============================================================================
// Client
// =============================================================================

export class ElasticsearchStore implements DocumentStore {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly dispatcher: Agent;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof undiciFetch;
  private index = "";

  constructor(options: ElasticsearchOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? undiciFetch;
    this.headers = { "Content-Type": "application/json" };

    // Same precedence as the Elasticsearch clients: API key, bearer, basic
    if (options.apiKey) {
      this.headers.Authorization = `ApiKey ${options.apiKey}`;
    } else if (options.bearer) {
      this.headers.Authorization = `Bearer ${options.bearer}`;
    } else if (options.user && options.password !== undefined) {
      const token = Buffer.from(`${options.user}:${options.password}`).toString("base64");
      this.headers.Authorization = `Basic ${token}`;
    }

    let ca: Buffer | undefined;
    if (options.caCertPath) {
      try {
        ca = readFileSync(options.caCertPath);
      } catch (error) {
        throw new ConfigurationError(
          `Cannot read CA certificate ${options.caCertPath}: ${describeError(error)}`,
          { cause: error },
        );
      }
    }

    this.dispatcher = new Agent({
      connect: { rejectUnauthorized: options.verifyTls, ca },
    });
  }

  /**
   * Send one request and parse the JSON reply.
   * Network errors and timeouts surface as retryable StoreRequestErrors.
   */
  private async request(
    method: string,
    path: string,
    body: string,
    contentType = "application/json",
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: { ...this.headers, "Content-Type": contentType },
        body,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new StoreRequestError(`${method} ${path}: ${describeError(error)}`, 0, true, {
        cause: error,
      });
    }

    const text = await response.text();
    if (!response.ok) {
      throw new StoreRequestError(
        `${method} ${path}: HTTP ${response.status} ${text.slice(0, 500)}`,
        response.status,
        RETRYABLE_STATUSES.has(response.status),
      );
    }
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new StoreRequestError(`${method} ${path}: invalid JSON reply`, response.status, false, {
        cause: error,
      });
    }
  }

  private toPage(reply: unknown, path: string): ScrollPage {
    const parsed = SearchResponseSchema.safeParse(reply);
    if (!parsed.success) {
      throw new StoreRequestError(`${path}: unexpected search reply shape`, 200, false);
    }
    const hits = parsed.data.hits?.hits ?? [];
    return {
      documents: hits.map((hit) => ({
        id: hit._id,
        index: hit._index ?? this.index,
        source: hit._source ?? {},
      })),
      cursor: parsed.data._scroll_id ?? null,
    };
  }

  async openScroll(request: ScrollRequest): Promise<ScrollPage> {
    this.index = request.index;
    const path = `/${encodeURIComponent(request.index)}/_search?scroll=${encodeURIComponent(request.keepAlive)}`;
    const reply = await this.request(
      "POST",
      path,
      JSON.stringify({ size: request.size, ...request.query }),
    );
    return this.toPage(reply, path);
  }

  async nextPage(cursor: string, keepAlive: string): Promise<ScrollPage> {
    const path = "/_search/scroll";
    try {
      const reply = await this.request(
        "POST",
        path,
        JSON.stringify({ scroll: keepAlive, scroll_id: cursor }),
      );
      return this.toPage(reply, path);
    } catch (error) {
      // An expired scroll context comes back as 404
      if (error instanceof StoreRequestError && error.status === 404) {
        throw new StoreRequestError(error.message, 404, true, { cause: error });
      }
      throw error;
    }
  }

  async closeScroll(cursor: string): Promise<void> {
    await this.request("DELETE", "/_search/scroll", JSON.stringify({ scroll_id: [cursor] }));
  }

  async bulkUpdate(actions: readonly UpdateAction[]): Promise<BulkItemResult[]> {
    if (actions.length === 0) return [];

    const lines: string[] = [];
    for (const action of actions) {
      lines.push(
        JSON.stringify({
          update: { _index: action.index, _id: action.id, retry_on_conflict: action.retryOnConflict },
        }),
      );
      lines.push(JSON.stringify({ script: action.script }));
    }

    const reply = await this.request("POST", "/_bulk", `${lines.join("\n")}\n`, "application/x-ndjson");
    const parsed = BulkResponseSchema.safeParse(reply);
    if (!parsed.success || parsed.data.items.length !== actions.length) {
      throw new StoreRequestError("/_bulk: unexpected bulk reply shape", 200, false);
    }

    return parsed.data.items.map((item, position): BulkItemResult => {
      const id = actions[position].id;
      const result = Object.values(item)[0];
      if (!result) return { id, ok: false, error: "empty bulk item" };
      if (result.error !== undefined || result.status >= 300) {
        return { id, ok: false, error: `HTTP ${result.status} ${describeBulkError(result.error)}` };
      }
      return { id, ok: true };
    });
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

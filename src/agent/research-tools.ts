/**
 * Read-only research tools backed by the network egress gate.
 *
 * search    → GET <searchUrl>?q=<query>&count=<n> on the search connector,
 *             JSON body `{ results: [{ title, url, description }] }`.
 * fetchPage → GET on the web connector; HTML is reduced to text and
 *             redacted before the reasoner sees it.
 */

import { z } from "zod";
import type { NetworkEgressGate } from "../network/egress.js";
import type { FetchedPage, ReadOnlyTools, SearchHit } from "./types.js";

export const SEARCH_CONNECTOR_ID = "search";
export const WEB_CONNECTOR_ID = "web";

const SearchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        description: z.string().default(""),
      }),
    )
    .default([]),
});

export interface ResearchToolsOptions {
  gate: NetworkEgressGate;
  searchUrl: string;
  resultCount?: number;
  searchConnectorId?: string;
  webConnectorId?: string;
}

// ---------------------------------------------------------------------------
// Text extraction + redaction
// ---------------------------------------------------------------------------

const REDACTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "[email]"],
  [/\+?\d[\d\s().-]{8,}\d/g, "[number]"],
];

export function redact(text: string): string {
  return REDACTIONS.reduce((acc, [pattern, label]) => acc.replace(pattern, label), text);
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

function decodeEntities(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (m) => ENTITIES[m] ?? m);
}

export function htmlToText(html: string): { title: string; text: string } {
  const titleMatch = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  const title = titleMatch ? decodeEntities(titleMatch[1].trim()) : "";
  const text = decodeEntities(
    html
      .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, " ")
      .replace(/<[^>]+>/g, " "),
  )
    .replace(/\s+/g, " ")
    .trim();
  return { title, text };
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export class GatedResearchTools implements ReadOnlyTools {
  private readonly opts: Required<ResearchToolsOptions>;

  constructor(opts: ResearchToolsOptions) {
    this.opts = {
      gate: opts.gate,
      searchUrl: opts.searchUrl,
      resultCount: opts.resultCount ?? 5,
      searchConnectorId: opts.searchConnectorId ?? SEARCH_CONNECTOR_ID,
      webConnectorId: opts.webConnectorId ?? WEB_CONNECTOR_ID,
    };
  }

  async search(query: string): Promise<SearchHit[]> {
    const url = new URL(this.opts.searchUrl);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(this.opts.resultCount));

    const response = await this.opts.gate.execute({
      connectorId: this.opts.searchConnectorId,
      url: url.toString(),
      headers: { accept: "application/json" },
    });
    if (response.status < 200 || response.status >= 300) {
      throw new Error(`search returned HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch {
      throw new Error("search response is not JSON");
    }
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`search response has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data.results.slice(0, this.opts.resultCount).map((r) => ({
      title: redact(r.title),
      url: r.url,
      description: redact(r.description),
    }));
  }

  async fetchPage(url: URL): Promise<FetchedPage> {
    const response = await this.opts.gate.execute({
      connectorId: this.opts.webConnectorId,
      url: url.toString(),
      headers: { accept: "text/html, text/plain" },
    });
    if (response.status < 200 || response.status >= 300) {
      throw new Error(`fetch returned HTTP ${response.status}`);
    }
    const contentType = response.headers["content-type"] ?? "";
    const extracted = contentType.includes("html")
      ? htmlToText(response.body)
      : { title: "", text: response.body.trim() };
    return {
      title: redact(extracted.title) || url.hostname,
      host: url.hostname,
      text: redact(extracted.text),
    };
  }
}

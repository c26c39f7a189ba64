import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { subjectKey, type ReportCache } from "@prospect-intel/agents";
import { CompanySchema, ListCachedSchema } from "../schemas/prospect.js";
import { wrapResponse } from "../formatters/response.js";

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export async function getCachedReport(cache: ReportCache, params: unknown) {
  try {
    const { company } = CompanySchema.parse(params);
    const report = await cache.lookup(subjectKey(company));
    return wrapResponse(report ? { found: true, report } : { found: false, company });
  } catch (err) {
    return wrapResponse(asError(err));
  }
}

export async function invalidateCachedReport(cache: ReportCache, params: unknown) {
  try {
    const { company } = CompanySchema.parse(params);
    const removed = await cache.invalidate(subjectKey(company));
    return wrapResponse({ company, removed });
  } catch (err) {
    return wrapResponse(asError(err));
  }
}

export async function listCachedCompanies(cache: ReportCache) {
  try {
    const entries = await cache.list();
    return wrapResponse({ count: entries.length, entries });
  } catch (err) {
    return wrapResponse(asError(err));
  }
}

export function registerCacheTools(server: McpServer, cache: ReportCache) {
  server.tool(
    "get_cached_report",
    "Return the cached sales-intelligence report for a company without running the pipeline. Responds with found=false when nothing is cached (or the entry has expired).",
    CompanySchema.shape,
    async (params) => getCachedReport(cache, params)
  );

  server.tool(
    "invalidate_cached_report",
    "Remove a company's cached report so the next prospect_company call runs every stage again. Removing a company that is not cached is not an error.",
    CompanySchema.shape,
    async (params) => invalidateCachedReport(cache, params)
  );

  server.tool(
    "list_cached_companies",
    "List every company with a cached report: normalised key, display name, run status and when it was cached.",
    ListCachedSchema.shape,
    async () => listCachedCompanies(cache)
  );
}

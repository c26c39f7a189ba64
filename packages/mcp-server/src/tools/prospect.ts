import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Orchestrator } from "@prospect-intel/agents";
import { ProspectCompanySchema } from "../schemas/prospect.js";
import { wrapResponse, coerceBooleans } from "../formatters/response.js";

/** Run the pipeline for one company; every run status is a successful tool call */
export async function prospectCompany(orchestrator: Orchestrator, params: unknown) {
  try {
    const { company, bypass_cache } = ProspectCompanySchema.parse(coerceBooleans(params, ["bypass_cache"]));
    const report = await orchestrator.run(company, { bypassCache: bypass_cache ?? false });
    return wrapResponse(report);
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}

export function registerProspectTools(server: McpServer, orchestrator: Orchestrator) {
  server.tool(
    "prospect_company",
    "Build a sales-intelligence report for a company: web research, business analysis (challenges, opportunities, recommended approach), prioritised decision-maker contacts and personalised outreach emails. Returns the cached report when one exists unless bypass_cache is set. The report's status is completed, partial_failure or failed, with per-stage errors.",
    ProspectCompanySchema.shape,
    async (params) => prospectCompany(orchestrator, params)
  );
}

import { z } from "zod";

const company = z
  .string()
  .trim()
  .min(1, "company must not be empty")
  .describe("Company name, e.g. \"Acme Corporation\" (case and spacing are normalised)");

export const ProspectCompanySchema = z.object({
  company,
  bypass_cache: z
    .boolean()
    .optional()
    .describe("Ignore any cached report and run every stage again (default: false)"),
});

export const CompanySchema = z.object({
  company,
});

export const ListCachedSchema = z.object({});

export type ProspectCompanyInput = z.infer<typeof ProspectCompanySchema>;
export type CompanyInput = z.infer<typeof CompanySchema>;

// Zod schemas for the persisted cache file
// The file is untrusted input at startup: anything that fails these schemas is discarded

import { z } from 'zod';
import type {
  AnalysisOutput, ContactOutput, OutreachOutput, ResearchOutput, SearchResult, StageName, Subject,
} from '../types/stages.js';
import type { CacheEntry, Report, StageErrorRecord } from '../types/report.js';

export const CACHE_FILE_VERSION = 1;

export const StageNameSchema: z.ZodType<StageName> = z.enum([
  'research', 'analysis', 'contact-discovery', 'outreach-generation',
]);

const SearchResultSchema: z.ZodType<SearchResult> = z.object({
  title: z.string(),
  snippet: z.string(),
  url: z.string(),
});

const ResearchOutputSchema: z.ZodType<ResearchOutput> = z.object({
  kind: z.literal('research'),
  company: z.string(),
  overview: z.object({
    summary: z.string(),
    website: z.string().optional(),
    keyFacts: z.array(z.string()),
  }),
  recentNews: z.array(SearchResultSchema),
  sources: z.array(SearchResultSchema),
});

const AnalysisOutputSchema: z.ZodType<AnalysisOutput> = z.object({
  kind: z.literal('analysis'),
  analysis: z.string(),
  keyChallenges: z.array(z.string()),
  opportunities: z.array(z.string()),
  recommendedApproach: z.string(),
});

const ContactOutputSchema: z.ZodType<ContactOutput> = z.object({
  kind: z.literal('contact-discovery'),
  totalContactsFound: z.number().int().nonnegative(),
  prioritizedContacts: z.array(z.object({
    name: z.string(),
    title: z.string(),
    profileUrl: z.string().optional(),
    email: z.string().optional(),
    priorityScore: z.number(),
    priorityReason: z.string(),
  })),
});

const OutreachOutputSchema: z.ZodType<OutreachOutput> = z.object({
  kind: z.literal('outreach-generation'),
  emails: z.array(z.object({
    recipient: z.string(),
    title: z.string(),
    emailAddress: z.string().optional(),
    subject: z.string(),
    body: z.string(),
    priorityScore: z.number(),
  })),
});

const StageErrorRecordSchema: z.ZodType<StageErrorRecord> = z.object({
  stage: StageNameSchema,
  kind: z.enum(['transient', 'terminal', 'invariant']),
  message: z.string(),
  attempts: z.number().int().nonnegative(),
  occurredAt: z.string(),
});

export const ReportSchema: z.ZodType<Report> = z.object({
  runId: z.string(),
  subject: z.string(),
  company: z.string(),
  status: z.enum(['completed', 'partial_failure', 'failed']),
  outputs: z.object({
    'research': ResearchOutputSchema.optional(),
    'analysis': AnalysisOutputSchema.optional(),
    'contact-discovery': ContactOutputSchema.optional(),
    'outreach-generation': OutreachOutputSchema.optional(),
  }),
  errors: z.array(StageErrorRecordSchema),
  skippedStages: z.array(StageNameSchema),
  startedAt: z.string(),
  completedAt: z.string(),
  durationMs: z.number().nonnegative(),
  servedFromCache: z.boolean(),
});

const SubjectSchema: z.ZodType<Subject> = z.object({
  key: z.string().min(1),
  displayName: z.string().min(1),
});

export const CacheEntrySchema: z.ZodType<CacheEntry> = z.object({
  subject: SubjectSchema,
  report: ReportSchema,
  createdAt: z.string().datetime(),
});

export const CacheFileSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  entries: z.record(z.string(), CacheEntrySchema),
});

export type CacheFile = z.infer<typeof CacheFileSchema>;

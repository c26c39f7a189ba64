// Pipeline stages — the four sequential agents and their tagged outputs
// Each output variant carries `kind` = the stage that produced it

export type StageName =
  | 'research'
  | 'analysis'
  | 'contact-discovery'
  | 'outreach-generation';

export const STAGE_ORDER: readonly StageName[] = [
  'research',
  'analysis',
  'contact-discovery',
  'outreach-generation',
];

/** required: terminal failure aborts the run. best-effort: failure degrades it. */
export type StagePolicy = 'required' | 'best-effort';

export interface Subject {
  /** Normalised cache key (trimmed, collapsed whitespace, lower-case) */
  readonly key: string;
  /** The company name as the caller typed it, whitespace collapsed */
  readonly displayName: string;
}

export interface SearchResult {
  title: string;
  snippet: string;
  url: string;
}

export interface CompanyOverview {
  summary: string;
  website?: string;
  keyFacts: string[];
}

export interface ResearchOutput {
  kind: 'research';
  company: string;
  overview: CompanyOverview;
  recentNews: SearchResult[];
  sources: SearchResult[];
}

export interface AnalysisOutput {
  kind: 'analysis';
  analysis: string;
  keyChallenges: string[];
  opportunities: string[];
  recommendedApproach: string;
}

export interface Contact {
  name: string;
  title: string;
  profileUrl?: string;
  email?: string;
  priorityScore: number;
  priorityReason: string;
}

export interface ContactOutput {
  kind: 'contact-discovery';
  totalContactsFound: number;
  prioritizedContacts: Contact[];
}

export interface OutreachEmail {
  recipient: string;
  title: string;
  emailAddress?: string;
  subject: string;
  body: string;
  priorityScore: number;
}

export interface OutreachOutput {
  kind: 'outreach-generation';
  emails: OutreachEmail[];
}

export type StageOutput = ResearchOutput | AnalysisOutput | ContactOutput | OutreachOutput;

export interface StageOutputMap {
  'research': ResearchOutput;
  'analysis': AnalysisOutput;
  'contact-discovery': ContactOutput;
  'outreach-generation': OutreachOutput;
}

export type StageOutcome<O extends StageOutput = StageOutput> =
  | { ok: true; output: O }
  | { ok: false; kind: 'transient' | 'terminal'; message: string };

/** What a stage may see of the run: outputs of stages that already finished */
export interface ExecutionContextReadView {
  readonly runId: string;
  readonly subject: Subject;
  outputOf<N extends StageName>(stage: N): StageOutputMap[N] | undefined;
  completedStages(): StageName[];
}

export interface Stage<O extends StageOutput = StageOutput> {
  readonly name: O['kind'];
  readonly policy: StagePolicy;
  /** Stages whose output must be present before this one may start */
  readonly requires: readonly StageName[];
  invoke(subject: Subject, view: ExecutionContextReadView, signal: AbortSignal): Promise<StageOutcome<O>>;
}

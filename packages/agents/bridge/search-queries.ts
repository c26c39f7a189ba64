// Query templates shared by the stages and the simulated search client

export const overviewQuery = (company: string) => `${company} company overview`;
export const newsQuery = (company: string) => `${company} news recent`;
export const contactsQuery = (company: string) => `${company} CEO executives leadership team`;

export type QueryIntent = 'overview' | 'news' | 'contacts';

const PATTERNS: Array<[QueryIntent, RegExp]> = [
  ['overview', /^(.+) company overview$/],
  ['news', /^(.+) news recent$/],
  ['contacts', /^(.+) CEO executives leadership team$/],
];

/** Reverse a templated query into its intent and company, or null for free-form queries */
export function parseQuery(query: string): { intent: QueryIntent; company: string } | null {
  for (const [intent, pattern] of PATTERNS) {
    const match = pattern.exec(query.trim());
    if (match) return { intent, company: match[1] };
  }
  return null;
}

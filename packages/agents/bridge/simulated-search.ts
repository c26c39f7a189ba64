// Simulated search — deterministic results for demo mode (no API key, no network)

import type { SearchResult } from '../types/stages.js';
import type { SearchClient, SearchOptions } from './search-client.js';
import { parseQuery } from './search-queries.js';

function domainOf(company: string): string {
  return `${company.toLowerCase().replace(/[^a-z0-9]/g, '') || 'example'}.com`;
}

function overviewResults(company: string): SearchResult[] {
  const domain = domainOf(company);
  return [
    {
      title: `${company} - Official Website`,
      snippet: `${company} is a leading technology company specializing in enterprise software solutions. Founded in 2010, the company serves Fortune 500 clients across finance, healthcare, and retail.`,
      url: `https://www.${domain}`,
    },
    {
      title: `${company} Company Profile | LinkedIn`,
      snippet: `${company} | 10,000+ employees. Innovative solutions that help businesses transform digitally. Industry: Technology, Software, Enterprise Solutions.`,
      url: `https://www.linkedin.com/company/${domain.replace('.com', '')}`,
    },
    {
      title: `About ${company} - Company Overview`,
      snippet: `${company} has raised $150M in Series C funding and serves over 2,000 enterprise clients worldwide, headquartered in San Francisco with offices in New York, London, and Singapore.`,
      url: `https://www.${domain}/about`,
    },
  ];
}

function newsResults(company: string): SearchResult[] {
  const domain = domainOf(company);
  return [
    {
      title: `${company} Announces Q3 Growth`,
      snippet: `${company} reported 45% year-over-year revenue growth in Q3, driven by strong enterprise adoption of its AI-powered platform.`,
      url: `https://news.example.com/${domain}/q3-growth`,
    },
    {
      title: `${company} Expands to APAC Region`,
      snippet: `${company} opens new offices in Singapore and Tokyo to support growing demand in Asia-Pacific markets.`,
      url: `https://news.example.com/${domain}/apac`,
    },
  ];
}

function contactResults(company: string): SearchResult[] {
  const people: Array<[string, string]> = [
    ['Jennifer Martinez', 'Chief Technology Officer'],
    ['David Thompson', 'VP of Engineering'],
    ['Emily Chen', 'Director of Product Management'],
    ['Michael Brown', 'Senior Account Executive'],
  ];
  return people.map(([name, title]) => ({
    title: `${name} - ${title} - ${company} | LinkedIn`,
    snippet: `${name} is ${title} at ${company}.`,
    url: `https://www.linkedin.com/in/${name.toLowerCase().replace(/\s+/g, '')}`,
  }));
}

export class SimulatedSearchClient implements SearchClient {
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const limit = options.limit ?? 5;
    const parsed = parseQuery(query);
    if (!parsed) {
      return overviewResults(query.trim()).slice(0, limit);
    }
    switch (parsed.intent) {
      case 'overview':
        return overviewResults(parsed.company).slice(0, limit);
      case 'news':
        return newsResults(parsed.company).slice(0, limit);
      case 'contacts':
        return contactResults(parsed.company).slice(0, limit);
    }
  }
}

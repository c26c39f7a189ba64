// Contact extraction and prioritisation
// Turns people-search results ("Name - Title - Company | LinkedIn") into ranked contacts

import type { Contact, SearchResult } from '../types/stages.js';

export interface RawContact {
  name: string;
  title: string;
  profileUrl?: string;
  email?: string;
}

const SENIOR_TITLE = /\b(cto|vp|chief|director|head)\b/i;
const TECH_DEPARTMENT = /technology|engineering/i;
const NAME_PATTERN = /^[\p{Lu}][\p{L}'.-]*(?: [\p{Lu}][\p{L}'.-]*){1,3}$/u;

/** Parse one search result; null when the title does not look like a person */
export function parseContact(result: SearchResult): RawContact | null {
  const head = result.title.split('|')[0].trim();
  const parts = head.split(/\s+[-–—]\s+/).map(p => p.trim()).filter(Boolean);
  if (parts.length < 2) return null;

  const [name, title] = parts;
  if (!NAME_PATTERN.test(name)) return null;

  const contact: RawContact = { name, title };
  if (/linkedin\.com\/in\//i.test(result.url)) contact.profileUrl = result.url;
  return contact;
}

/** Unique contacts in result order (first occurrence of a name wins) */
export function extractContacts(results: readonly SearchResult[]): RawContact[] {
  const seen = new Set<string>();
  const contacts: RawContact[] = [];
  for (const result of results) {
    const contact = parseContact(result);
    if (!contact) continue;
    const key = contact.name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    contacts.push(contact);
  }
  return contacts;
}

/** +10 for a senior title, +5 for a technology or engineering role */
export function priorityScore(title: string): number {
  let score = 0;
  if (SENIOR_TITLE.test(title)) score += 10;
  if (TECH_DEPARTMENT.test(title)) score += 5;
  return score;
}

export function priorityReason(title: string): string {
  if (/\bCTO\b/.test(title) || title.includes('Chief Technology')) {
    return 'Senior technology decision maker - high influence on tech purchases';
  }
  if (/\bVP\b/.test(title)) return 'Executive level contact - can champion solutions internally';
  if (title.includes('Director')) return 'Department leader - involved in solution evaluation';
  return 'Key stakeholder in decision process';
}

/** Highest score first; ties keep their search order */
export function prioritizeContacts(contacts: readonly RawContact[]): Contact[] {
  return contacts
    .map(c => ({
      ...c,
      priorityScore: priorityScore(c.title),
      priorityReason: priorityReason(c.title),
    }))
    .sort((a, b) => b.priorityScore - a.priorityScore);
}

// Scam Honeypot - Entity Extractor
// Pulls reportable identifiers out of scammer messages and normalises them
// to one canonical form each, so repeats across turns collapse.

import { loadCatalog, type EntityLexicon } from "./catalog.js";
import { INTEL_KINDS, emptyIntelligence, type ExtractedIntelligence, type SignalMatch } from "./types.js";

// ─── Patterns ───────────────────────────────────────────────────────────────────

const PHONE = /(?<![\d+])(?:\+?91[\s-]?|0)?([6-9]\d{4}[\s-]?\d{5})(?!\d)/g;

const BANK_ACCOUNT_CONTEXT = [
  /\b(?:account|a\/c|acct|acc)\s*(?:no\.?|number|num|#)?[\s:.#-]*(\d[\d-]{7,20}\d)\b/gi,
  /\b(?:transfer|deposit|send|credit)\s*(?:it\s*)?to\s*(?:account\s*)?(\d{9,18})\b/gi,
  /\b(?:beneficiary|payee|receiver)\s*(?:account|a\/c)?\s*(?:no\.?|number)?[\s:.#-]*(\d{9,18})\b/gi,
];

const UPI = /(?<![\w.-])([\w.-]{2,}@([a-z][a-z0-9]{1,30}))\b(?![.-]?[a-z0-9])/gi;

const EMAIL = /\b[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}\b/gi;

const HTTP_URL = /https?:\/\/[^\s<>"'{}|\\^`[\]]+/gi;
const MESSENGER_LINK = /\b(?:wa\.me|t\.me)\/[\w+]+/gi;

const IFSC = /\b[A-Z]{4}0[A-Z0-9]{6}\b/g;
const PAN = /\b[A-Z]{3}[ABCFGHLJPT][A-Z]\d{4}[A-Z]\b/g;
const AADHAAR_SPACED = /\b[2-9]\d{3}[\s-]\d{4}[\s-]\d{4}\b/g;
const AADHAAR_CONTEXT = /\b(?:aadhaar|aadhar|uid)\s*(?:no\.?|number|card|id)?[\s:.#-]*(\d{4}[\s-]?\d{4}[\s-]?\d{4})\b/gi;

const CASE_ID_CONTEXT =
  /\b(?:case|complaint|reference|ref|ticket|fir)\s*(?:id|no\.?|number|#)[\s:#.-]*([a-z0-9][a-z0-9/-]{2,24})\b/gi;
const CASE_ID_PREFIXED = /\b(?:FIR|CBI|NCB|ED|FRD|CYBER|CASE|REF|DRI)-[A-Z0-9-]{3,25}\b/g;

const TRAILING_PUNCTUATION = /[.,;:!?)\]'"]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function* matchesOf(pattern: RegExp, text: string): Generator<RegExpExecArray> {
  const re = new RegExp(pattern.source, pattern.flags);
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    yield m;
    if (m[0].length === 0) re.lastIndex++;
  }
}

function pushUnique(list: string[], value: string): void {
  if (value.length > 0 && !list.includes(value)) list.push(value);
}

// ─── Normalisation ──────────────────────────────────────────────────────────────

export function canonicalPhone(raw: string): string | null {
  let digits = raw.replace(/\D/g, "");
  if (digits.length === 12 && digits.startsWith("91")) digits = digits.slice(2);
  else if (digits.length === 11 && digits.startsWith("0")) digits = digits.slice(1);
  return /^[6-9]\d{9}$/.test(digits) ? `+91${digits}` : null;
}

export function canonicalUrl(raw: string): string {
  return raw.toLowerCase().replace(TRAILING_PUNCTUATION, "").replace(/\/+$/, "");
}

// ─── Extractor ──────────────────────────────────────────────────────────────────

export class EntityExtractor {
  private readonly lexicon: EntityLexicon;
  private readonly bareLinks: RegExp[];

  constructor(lexicon: EntityLexicon = loadCatalog().entities) {
    this.lexicon = lexicon;
    const shorteners = lexicon.shorteners.map(escapeRegExp).join("|");
    const tlds = lexicon.suspiciousTlds.join("|");
    this.bareLinks = [MESSENGER_LINK];
    if (shorteners) this.bareLinks.push(new RegExp(`\\b(?:${shorteners})\\/[\\w-]+`, "gi"));
    if (tlds) this.bareLinks.push(new RegExp(`\\b[a-z0-9-]{4,}\\.(?:${tlds})\\b(?:\\/\\S*)?`, "gi"));
  }

  /** Entities found in one message. `suspiciousKeywords` is left empty; see keywordsFor(). */
  extract(text: string): ExtractedIntelligence {
    const out = emptyIntelligence();
    if (text.trim().length === 0) return out;

    for (const m of matchesOf(PHONE, text)) {
      const phone = canonicalPhone(m[0]);
      if (phone) pushUnique(out.phoneNumbers, phone);
    }

    for (const pattern of BANK_ACCOUNT_CONTEXT) {
      for (const m of matchesOf(pattern, text)) {
        const digits = m[1].replace(/-/g, "");
        if (/^\d{9,18}$/.test(digits)) pushUnique(out.bankAccounts, digits);
      }
    }

    for (const m of matchesOf(UPI, text)) {
      if (this.lexicon.upiProviders.has(m[2].toLowerCase())) pushUnique(out.upiIds, m[1].toLowerCase());
    }

    for (const m of matchesOf(EMAIL, text)) {
      const email = m[0].toLowerCase();
      if (!out.upiIds.includes(email)) pushUnique(out.emailAddresses, email);
    }

    this.extractLinks(text, out.phishingLinks);

    for (const m of matchesOf(IFSC, text)) pushUnique(out.ifscCodes, m[0]);

    for (const m of matchesOf(PAN, text)) pushUnique(out.governmentIds, m[0]);
    for (const m of matchesOf(AADHAAR_CONTEXT, text)) pushUnique(out.governmentIds, m[1].replace(/\D/g, ""));
    for (const m of matchesOf(AADHAAR_SPACED, text)) pushUnique(out.governmentIds, m[0].replace(/\D/g, ""));

    for (const m of matchesOf(CASE_ID_PREFIXED, text)) pushUnique(out.caseIds, m[0]);
    for (const m of matchesOf(CASE_ID_CONTEXT, text)) {
      const id = m[1].toUpperCase();
      if (/\d/.test(id)) pushUnique(out.caseIds, id);
    }

    return out;
  }

  /** Lower-cased text each matched signal layer fired on, for the report. */
  keywordsFor(text: string, matches: readonly SignalMatch[]): string[] {
    const keywords: string[] = [];
    for (const match of matches) {
      const hit = new RegExp(match.pattern, "i").exec(text);
      if (hit) pushUnique(keywords, hit[0].toLowerCase().replace(/\s+/g, " ").trim());
    }
    return keywords;
  }

  private extractLinks(text: string, links: string[]): void {
    for (const m of matchesOf(HTTP_URL, text)) pushUnique(links, canonicalUrl(m[0]));
    for (const pattern of this.bareLinks) {
      for (const m of matchesOf(pattern, text)) {
        const link = canonicalUrl(m[0]);
        if (!links.some((l) => l.includes(link))) pushUnique(links, link);
      }
    }
  }
}

/**
 * Adds unseen values from `found` into `target`, kind by kind, and returns
 * how many were new.
 */
export function mergeIntelligence(target: ExtractedIntelligence, found: ExtractedIntelligence): number {
  let added = 0;
  for (const kind of INTEL_KINDS) {
    for (const value of found[kind]) {
      if (!target[kind].includes(value)) {
        target[kind].push(value);
        added++;
      }
    }
  }
  return added;
}

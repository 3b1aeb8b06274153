import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { PropertyType } from '../types.js';
import { slugify } from '../utils/text.js';

export type { CheerioAPI };
export type Card = Cheerio<AnyNode>;

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

export function cleanText(value: string | null | undefined): string {
  if (!value) return '';
  return value.replace(/\s+/g, ' ').trim();
}

/** Trimmed text of the first element matching any of `selectors`, or null. */
export function textIn(card: Card, selectors: string[]): string | null {
  for (const selector of selectors) {
    const text = cleanText(card.find(selector).first().text());
    if (text.length > 0) return text;
  }
  return null;
}

export function attrIn(card: Card, selectors: string[], attr: string): string | null {
  for (const selector of selectors) {
    const value = card.find(selector).first().attr(attr);
    if (value && value.trim().length > 0) return value.trim();
  }
  return null;
}

/**
 * Parse a Brazilian price: "R$ 1.250.000", "R$ 850 mil", "R$ 1,2 mi".
 * "Sob consulta" and friends yield null.
 */
export function parseBrlPrice(text: string | null | undefined): number | null {
  if (!text) return null;
  const lower = text.toLowerCase();
  if (/sob consulta|consulte|a negociar/.test(lower)) return null;

  const match = /r\$\s*([\d.,]+)\s*(milh[õo]es|milh[ãa]o|mil|mi)?/i.exec(text);
  if (!match) return null;

  const [, digits, suffix] = match;
  if (suffix) {
    const scaled = Number(digits.replace(/\./g, '').replace(',', '.'));
    if (!Number.isFinite(scaled)) return null;
    const multiplier = suffix.toLowerCase() === 'mil' ? 1_000 : 1_000_000;
    return Math.round(scaled * multiplier);
  }

  // Dots are thousands separators; anything after a comma is cents.
  const whole = digits.split(',')[0].replace(/\./g, '');
  const value = Number(whole);
  return Number.isFinite(value) && value > 0 ? value : null;
}

/** First integer preceding `unit` in `text` (e.g. "3 quartos" with /quarto/). */
export function numberBefore(text: string, unit: RegExp): number | null {
  const pattern = new RegExp(`(\\d+(?:[.,]\\d+)?)\\s*(?:${unit.source})`, 'i');
  const match = pattern.exec(text);
  if (!match) return null;
  const value = Number(match[1].replace(',', '.'));
  return Number.isFinite(value) ? value : null;
}

const NOT_NEIGHBORHOODS = ['brasil', 'brazil'];

/**
 * Pull the neighborhood out of addresses like
 * "Rua Fradique Coutinho, 100 - Pinheiros, São Paulo - SP".
 */
export function extractNeighborhood(address: string | null, city: string): string | null {
  if (!address) return null;
  const cityKey = slugify(city);
  const patterns = [/-\s*([^,\d-][^,-]*?)\s*,/, /,\s*([^,\d]+?)\s*,/, /-\s*([^-,\d]+?)\s*$/];

  for (const pattern of patterns) {
    const match = pattern.exec(address);
    if (!match) continue;
    const candidate = cleanText(match[1]);
    const key = slugify(candidate);
    if (candidate.length > 2 && key !== cityKey && !NOT_NEIGHBORHOODS.includes(key) && !/^[A-Za-z]{2}$/.test(candidate)) {
      return candidate;
    }
  }
  return null;
}

const TYPE_KEYWORDS: Array<[RegExp, PropertyType]> = [
  [/cobertura/i, 'penthouse'],
  [/\bloft\b/i, 'loft'],
  [/studio|est[úu]dio|kitnet|kitinete/i, 'studio'],
  [/condom[íi]nio/i, 'condo'],
  [/apartamento|\bapto\b|\bapt\b/i, 'apartment'],
  [/\bcasa\b|sobrado/i, 'house']
];

export function inferPropertyType(text: string): PropertyType | null {
  for (const [pattern, type] of TYPE_KEYWORDS) {
    if (pattern.test(text)) return type;
  }
  return null;
}

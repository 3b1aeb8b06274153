import { AdapterError } from '../errors.js';
import type { ListingRecord, SearchFilters } from '../types.js';
import {
  attrIn,
  cleanText,
  extractNeighborhood,
  inferPropertyType,
  loadHtml,
  numberBefore,
  parseBrlPrice,
  textIn,
  type Card
} from './html.js';

/** Where a site keeps each field of a result card. Lists are tried in order. */
export interface CardSelectors {
  cards: string;
  title: string[];
  price: string[];
  address: string[];
  link: string[];
  size: string[];
  bedrooms: string[];
  bathrooms: string[];
  parking: string[];
  noResults: string;
}

export interface PageContext {
  source: string;
  pageUrl: string;
  filters: SearchFilters;
  /** Captures the site's numeric listing id from a listing URL. */
  idPattern: RegExp;
  fetchedAt: string;
}

export interface ParsedPage {
  records: ListingRecord[];
  cards: number;
  skipped: number;
}

const NO_RESULTS_TEXT = /nenhum im[óo]vel encontrado|n[ãa]o encontramos (?:im[óo]veis|resultados)/i;
const CHALLENGE_TEXT = /just a moment|attention required|verifique se voc[êe] [ée] humano/i;
const PRICE_TEXT = /R\$\s*[\d.,]+(?:\s*(?:mil|mi)\b)?/i;

const SIZE_UNIT = /m²|m2|metros/;
const BEDROOM_UNIT = /quartos?|dorms?\.?|dormit[óo]rios?/;
const BATHROOM_UNIT = /banheiros?|banhos?/;
const PARKING_UNIT = /vagas?/;

type QueryValue = number | null | undefined;

/** Add `key=value` to `url` unless the value is absent. */
export function setQuery(url: URL, key: string, value: QueryValue): void {
  if (value === null || value === undefined) return;
  url.searchParams.set(key, String(value));
}

function wholeNumber(value: number | null): number | null {
  return value === null ? null : Math.round(value);
}

function resolveUrl(href: string | null, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function parseCard(card: Card, selectors: CardSelectors, ctx: PageContext): ListingRecord | null {
  const fullText = cleanText(card.text());

  const title = textIn(card, selectors.title) ?? attrIn(card, selectors.link, 'title');
  const priceText = textIn(card, selectors.price) ?? PRICE_TEXT.exec(fullText)?.[0] ?? null;
  const price = parseBrlPrice(priceText);
  if (!title || price === null) return null;

  const href = attrIn(card, selectors.link, 'href') ?? card.attr('href') ?? null;
  const url = resolveUrl(href, ctx.pageUrl);
  const id = (url ? ctx.idPattern.exec(url)?.[1] : undefined) ?? card.attr('data-id') ?? null;

  const detail = (fieldSelectors: string[], unit: RegExp) =>
    numberBefore(textIn(card, fieldSelectors) ?? fullText, unit) ?? numberBefore(fullText, unit);

  const address = textIn(card, selectors.address);

  return {
    source: ctx.source,
    sourceId: id ? `${ctx.source}:${id}` : null,
    url,
    title,
    price,
    size: detail(selectors.size, SIZE_UNIT),
    bedrooms: wholeNumber(detail(selectors.bedrooms, BEDROOM_UNIT)),
    bathrooms: wholeNumber(detail(selectors.bathrooms, BATHROOM_UNIT)),
    parkingSpaces: wholeNumber(detail(selectors.parking, PARKING_UNIT)),
    propertyType: inferPropertyType(title) ?? ctx.filters.propertyType ?? null,
    address,
    neighborhood: extractNeighborhood(address, ctx.filters.city),
    city: ctx.filters.city,
    state: ctx.filters.state.toUpperCase(),
    fetchedAt: ctx.fetchedAt,
    provenance: 'live'
  };
}

/**
 * Turn a search results page into records. A page with no cards counts as
 * an empty result only when the site says so; anything else means the
 * layout changed under us and is reported as a permanent failure.
 */
export function parseListingPage(html: string, selectors: CardSelectors, ctx: PageContext): ParsedPage {
  const $ = loadHtml(html);

  if (CHALLENGE_TEXT.test($('title').text()) || $('#challenge-form, #cf-challenge-running').length > 0) {
    throw new AdapterError('permanent', `${ctx.source} served an anti-bot challenge page`);
  }

  const cards = $(selectors.cards);
  if (cards.length === 0) {
    const bodyText = cleanText($('body').text());
    if ($(selectors.noResults).length > 0 || NO_RESULTS_TEXT.test(bodyText)) {
      return { records: [], cards: 0, skipped: 0 };
    }
    throw new AdapterError('permanent', `${ctx.source} page layout not recognized (no listing cards)`);
  }

  const records: ListingRecord[] = [];
  let skipped = 0;
  cards.each((_, el) => {
    const record = parseCard($(el), selectors, ctx);
    if (record) records.push(record);
    else skipped++;
  });

  return { records, cards: cards.length, skipped };
}

import { createLogger } from '../logger.js';
import type { PropertyType, SearchFilters } from '../types.js';
import { slugify } from '../utils/text.js';
import { fetchHtml } from './http.js';
import { parseListingPage, setQuery, type CardSelectors } from './listingPage.js';
import type { SourceAdapter } from './sourceAdapter.js';

const logger = createLogger('adapter:vivareal');

const BASE_URL = 'https://www.vivareal.com.br';

const TYPE_SLUGS: Record<PropertyType, string> = {
  apartment: 'apartamento_residencial',
  house: 'casa_residencial',
  condo: 'condominio_residencial',
  penthouse: 'cobertura_residencial',
  studio: 'kitnet_residencial',
  loft: 'loft_residencial'
};

const SELECTORS: CardSelectors = {
  cards: 'article.property-card__container, div.property-card__container, [data-type="property"]',
  title: ['.property-card__title', 'h2', 'h3'],
  price: ['.property-card__price', '.js-property-card-prices'],
  address: ['.property-card__address', '.js-property-card-address'],
  link: ['a.property-card__content-link', 'a[href*="/imovel/"]', 'a[href]'],
  size: ['.property-card__detail-area', '.js-property-card-detail-area'],
  bedrooms: ['.property-card__detail-room', '.js-property-detail-rooms'],
  bathrooms: ['.property-card__detail-bathroom', '.js-property-detail-bathroom'],
  parking: ['.property-card__detail-garage', '.js-property-detail-garages'],
  noResults: '.results-list__empty, .js-no-results'
};

/** e.g. https://www.vivareal.com.br/venda/sp/sao-paulo/pinheiros/apartamento_residencial/?quartos=2 */
export function buildVivaRealUrl(filters: SearchFilters): string {
  const transaction = filters.transactionType === 'rent' ? 'aluguel' : 'venda';
  const segments = [transaction, filters.state.toLowerCase(), slugify(filters.city)];
  if (filters.neighborhood) segments.push(slugify(filters.neighborhood));
  if (filters.propertyType) segments.push(TYPE_SLUGS[filters.propertyType]);

  const url = new URL(`/${segments.join('/')}/`, BASE_URL);
  setQuery(url, 'preco-minimo', filters.price.min);
  setQuery(url, 'preco-maximo', filters.price.max);
  setQuery(url, 'area-util-minima', filters.size.min);
  setQuery(url, 'area-util-maxima', filters.size.max);
  setQuery(url, 'quartos', filters.bedrooms.min);
  if (filters.page > 1) setQuery(url, 'pagina', filters.page);
  return url.toString();
}

export function createVivaRealAdapter(): SourceAdapter {
  return {
    name: 'vivareal',
    async fetch(filters, { signal }) {
      const url = buildVivaRealUrl(filters);
      const page = await fetchHtml(url, { signal });
      const parsed = parseListingPage(page.html, SELECTORS, {
        source: 'vivareal',
        pageUrl: page.finalUrl,
        filters,
        idPattern: /id-(\d+)/,
        fetchedAt: new Date().toISOString()
      });
      logger.debug('parsed results page', { url, cards: parsed.cards, skipped: parsed.skipped });
      return { records: parsed.records };
    }
  };
}

import { createLogger } from '../logger.js';
import type { PropertyType, SearchFilters } from '../types.js';
import { slugify } from '../utils/text.js';
import { fetchHtml } from './http.js';
import { parseListingPage, setQuery, type CardSelectors } from './listingPage.js';
import type { SourceAdapter } from './sourceAdapter.js';

const logger = createLogger('adapter:zap');

const BASE_URL = 'https://www.zapimoveis.com.br';

const TYPE_SLUGS: Record<PropertyType, string> = {
  apartment: 'apartamentos',
  house: 'casas',
  condo: 'casas-de-condominio',
  penthouse: 'cobertura',
  studio: 'studio',
  loft: 'loft'
};

const SELECTORS: CardSelectors = {
  cards: '[data-testid="property-card"], [data-cy="rp-property-cd"], div.property-card, article.result-card',
  title: ['[data-cy="rp-cardProperty-location-txt"] h2', '.property-card__title', 'h2', 'h3'],
  price: ['[data-cy="rp-cardProperty-price-txt"]', '.property-card__price', '.listing-price'],
  address: ['[data-cy="rp-cardProperty-street-txt"]', '.property-card__address', '.card-address'],
  link: ['a[href*="/imovel/"]', 'a[href]'],
  size: ['[data-cy="rp-cardProperty-propertyArea-txt"]', '.property-card__area'],
  bedrooms: ['[data-cy="rp-cardProperty-bedroomQuantity-txt"]', '.property-card__bedrooms'],
  bathrooms: ['[data-cy="rp-cardProperty-bathroomQuantity-txt"]', '.property-card__bathrooms'],
  parking: ['[data-cy="rp-cardProperty-parkingSpacesQuantity-txt"]', '.property-card__parking'],
  noResults: '[data-testid="no-results"], .no-results'
};

/** e.g. https://www.zapimoveis.com.br/venda/apartamentos/sp+sao-paulo++pinheiros/?preco-maximo=800000 */
export function buildZapUrl(filters: SearchFilters): string {
  const transaction = filters.transactionType === 'rent' ? 'aluguel' : 'venda';
  const type = filters.propertyType ? TYPE_SLUGS[filters.propertyType] : 'imoveis';
  let location = `${filters.state.toLowerCase()}+${slugify(filters.city)}`;
  if (filters.neighborhood) location += `++${slugify(filters.neighborhood)}`;

  const url = new URL(`/${transaction}/${type}/${location}/`, BASE_URL);
  setQuery(url, 'preco-minimo', filters.price.min);
  setQuery(url, 'preco-maximo', filters.price.max);
  setQuery(url, 'area-minima', filters.size.min);
  setQuery(url, 'area-maxima', filters.size.max);
  setQuery(url, 'quartos', filters.bedrooms.min);
  if (filters.page > 1) setQuery(url, 'pagina', filters.page);
  return url.toString();
}

export function createZapAdapter(): SourceAdapter {
  return {
    name: 'zap',
    async fetch(filters, { signal }) {
      const url = buildZapUrl(filters);
      const page = await fetchHtml(url, { signal });
      const parsed = parseListingPage(page.html, SELECTORS, {
        source: 'zap',
        pageUrl: page.finalUrl,
        filters,
        idPattern: /\/imovel\/[^?#]*?(\d{5,})\/?(?:[?#]|$)/,
        fetchedAt: new Date().toISOString()
      });
      logger.debug('parsed results page', { url, cards: parsed.cards, skipped: parsed.skipped });
      return { records: parsed.records };
    }
  };
}

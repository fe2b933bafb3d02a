import { SourceSelectors, VehicleRecord } from '../types/index.js';
import { ListingPage } from '../scraper/listing-page.js';
import { ParseContext } from '../scraper/listing-selectors.js';

export const TEST_BASE_URL = 'https://cars.example.com/search';

export const testSelectors: SourceSelectors = {
  listing: 'article.card',
  link: 'a.link',
  title: 'h2',
  price: '.price',
  trim: '.trim',
  chargeType: '.charge',
  color: '.color',
  seats: '.seats',
  packs: '.packs li',
  location: '.location',
  mapLink: 'a.map',
  photo: 'img',
  loadMore: null,
};

export const testParseContext: ParseContext = {
  baseUrl: TEST_BASE_URL,
  selectors: testSelectors,
  trimLabel: null,
  chargeTypeLabel: null,
};

export interface CardOptions {
  title?: string;
  price?: string;
  color?: string;
}

/**
 * Minimal listing card for vehicle `id`, linking to /vehicles/{id}
 */
export function card(id: string, options: CardOptions = {}): string {
  const title = options.title ?? `Vehicle ${id}`;
  const price = options.price === undefined ? '' : `<span class="price">${options.price}</span>`;
  const color = options.color === undefined ? '' : `<span class="color">${options.color}</span>`;
  return `<article class="card"><a class="link" href="/vehicles/${id}">Voir</a><h2>${title}</h2>${price}${color}</article>`;
}

export function vehicleUrl(id: string): string {
  return `https://cars.example.com/vehicles/${id}`;
}

export function record(id: string, price: number | null): VehicleRecord {
  return {
    url: vehicleUrl(id),
    title: `Vehicle ${id}`,
    price,
    trim: null,
    chargeType: null,
    exteriorColor: null,
    seatType: null,
    packs: null,
    location: null,
    latitude: null,
    longitude: null,
    photoUrl: null,
  };
}

/**
 * Listing page that walks through fixed frames: each grow() moves to the
 * next frame, and the last frame repeats once the script runs out.
 */
export class ScriptedListingPage implements ListingPage {
  private index = 0;
  growCalls = 0;
  bodyTextValue = '';

  constructor(private readonly frames: string[][]) {}

  async readListings(): Promise<string[]> {
    return [...this.frames[this.index]];
  }

  async grow(): Promise<void> {
    this.growCalls++;
    if (this.index < this.frames.length - 1) this.index++;
  }

  async waitForGrowth(count: number): Promise<boolean> {
    return this.frames[this.index].length > count;
  }

  async content(): Promise<string> {
    return `<html><body>${this.frames[this.index].join('')}</body></html>`;
  }

  async bodyText(): Promise<string> {
    return this.bodyTextValue;
  }
}

/**
 * Listing page that loads one more card on every grow()
 */
export class EndlessListingPage implements ListingPage {
  private count = 1;
  growCalls = 0;

  async readListings(): Promise<string[]> {
    return Array.from({ length: this.count }, (_v, i) => card(`e${i + 1}`));
  }

  async grow(): Promise<void> {
    this.growCalls++;
    this.count++;
  }

  async waitForGrowth(count: number): Promise<boolean> {
    return this.count > count;
  }

  async content(): Promise<string> {
    return '<html><body></body></html>';
  }

  async bodyText(): Promise<string> {
    return '';
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Listing card parsing
 * Maps the outer HTML of one listing node into a normalized VehicleRecord
 */

import * as cheerio from 'cheerio';
import { SourceSelectors, VehicleRecord } from '../types/index.js';
import { canonicalizeUrl } from '../utils/canonicalize.js';
import { StructuralError } from '../utils/errors.js';
import { parsePrice } from './price-parser.js';

export interface ParseContext {
  baseUrl: string;
  selectors: SourceSelectors;
  /** Fallback trim when the card does not show one */
  trimLabel: string | null;
  /** Fallback charge type when the card does not show one */
  chargeTypeLabel: string | null;
}

export interface ParsedListing {
  record: VehicleRecord;
  /** Whitespace-collapsed card text, used by keyword filters */
  text: string;
}

const COORDINATE_PATTERNS = [
  /\/maps\/dir\/\/([-+]?\d+\.\d+),([-+]?\d+\.\d+)/,
  /@([-+]?\d+\.\d+),([-+]?\d+\.\d+)/,
  /[?&]q=([-+]?\d+\.\d+),([-+]?\d+\.\d+)/,
];

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parse "lat,lng" pairs out of a map link. Out-of-range values are rejected.
 */
export function extractCoordinates(href: string | undefined): { latitude: number; longitude: number } | null {
  if (!href) return null;

  for (const pattern of COORDINATE_PATTERNS) {
    const match = href.match(pattern);
    if (!match) continue;

    const latitude = parseFloat(match[1]);
    const longitude = parseFloat(match[2]);
    if (Math.abs(latitude) <= 90 && Math.abs(longitude) <= 180) {
      return { latitude, longitude };
    }
  }

  return null;
}

function parseCoordinateAttr(value: string | undefined): number | null {
  if (!value) return null;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseListing(html: string, ctx: ParseContext): ParsedListing {
  const $ = cheerio.load(html, null, false);
  const root = $.root().children().first();
  const { selectors } = ctx;

  const getText = (selector: string): string | null => {
    const text = collapseWhitespace(root.find(selector).first().text());
    return text.length > 0 ? text : null;
  };

  // The card itself may be the link
  const href = root.is(selectors.link) ? root.attr('href') : root.find(selectors.link).first().attr('href');
  const url = href ? canonicalizeUrl(href, ctx.baseUrl || undefined) : null;
  if (!url) {
    throw new StructuralError(`Listing link not found (selector "${selectors.link}")`);
  }

  const title = getText(selectors.title);
  if (!title) {
    throw new StructuralError(`Listing title not found for ${url} (selector "${selectors.title}")`);
  }

  const packItems = root
    .find(selectors.packs)
    .map((_i, el) => collapseWhitespace($(el).text()))
    .get()
    .filter(p => p.length > 0);
  const packs = packItems.length > 0 ? [...new Set(packItems)].sort() : null;

  const coordinates =
    extractCoordinates(root.find(selectors.mapLink).first().attr('href')) ??
    (() => {
      const latitude = parseCoordinateAttr(root.attr('data-lat'));
      const longitude = parseCoordinateAttr(root.attr('data-lng'));
      return latitude !== null && longitude !== null ? { latitude, longitude } : null;
    })();

  const photo = root.find(selectors.photo).first();
  const photoSrc = photo.attr('src') || photo.attr('data-src');

  const color = getText(selectors.color);

  return {
    record: {
      url,
      title,
      price: parsePrice(getText(selectors.price)),
      trim: getText(selectors.trim) ?? ctx.trimLabel,
      chargeType: getText(selectors.chargeType) ?? ctx.chargeTypeLabel,
      exteriorColor: color,
      seatType: getText(selectors.seats),
      packs,
      location: getText(selectors.location),
      latitude: coordinates?.latitude ?? null,
      longitude: coordinates?.longitude ?? null,
      photoUrl: photoSrc ? canonicalizeUrl(photoSrc, ctx.baseUrl || url) : null,
    },
    text: collapseWhitespace(root.text()),
  };
}

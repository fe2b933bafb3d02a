import { Config } from '../types/index.js';
import { ParsedListing } from './listing-selectors.js';

export type ListingFilter = (listing: ParsedListing) => boolean;

/**
 * Build the search-criteria filter. Listings it rejects are never reconciled,
 * so they count as not observed in the run.
 *
 * Keywords match the lowercased card text. Price bounds are whole currency units; a listing without a parsed price passes.
 */
export function createListingFilter(filters: Config['filters']): ListingFilter {
  const { excludedColors, excludedKeywords, requiredKeywords, priceMin, priceMax } = filters;

  return ({ record, text }) => {
    const color = (record.exteriorColor ?? '').toLowerCase();
    if (excludedColors.some(c => color.includes(c))) {
      return false;
    }

    const lowerText = text.toLowerCase();
    if (excludedKeywords.some(k => lowerText.includes(k))) {
      return false;
    }
    if (requiredKeywords.length > 0 && !requiredKeywords.some(k => lowerText.includes(k))) {
      return false;
    }

    if (record.price !== null) {
      if (priceMin !== null && record.price < priceMin * 100) return false;
      if (priceMax !== null && record.price > priceMax * 100) return false;
    }

    return true;
  };
}

export const acceptAll: ListingFilter = () => true;

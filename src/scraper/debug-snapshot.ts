import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { ListingPage } from './listing-page.js';

/**
 * Persist the raw page HTML for offline inspection after a structural failure.
 * Returns the written path, or null when the page or the file could not be read/written.
 */
export async function saveDebugSnapshot(page: ListingPage, path: string): Promise<string | null> {
  try {
    const html = await page.content();
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, html, 'utf-8');

    logger.warn('Saved debug snapshot of the listing page', { path, htmlLength: html.length });
    return path;
  } catch (error) {
    logger.error('Failed to save debug snapshot', { path, error: errorMessage(error) });
    return null;
  }
}

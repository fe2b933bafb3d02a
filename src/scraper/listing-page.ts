/**
 * A loaded, growable listing page
 *
 * The extractor only sees this interface; the browser-backed implementation
 * lives in browser-client.ts and tests drive a scripted one.
 */
export interface ListingPage {
  /** Outer HTML of every listing node currently in the page */
  readListings(): Promise<string[]>;
  /** Trigger content growth (scroll to bottom, click "load more") */
  grow(): Promise<void>;
  /**
   * Wait until more than `count` listing nodes are loaded.
   * Resolves false when `timeoutMs` elapses first.
   */
  waitForGrowth(count: number, timeoutMs: number): Promise<boolean>;
  /** Full page HTML */
  content(): Promise<string>;
  /** Visible text of the document body */
  bodyText(): Promise<string>;
}

export interface ListingSession {
  page: ListingPage;
  close(): Promise<void>;
}

/**
 * Handle to one element of the document a session currently shows.
 * Handles are invalidated by navigation.
 */
export interface PageElement {
  readonly handle: number;
  readonly tagName: string;
  readonly text: string; // whitespace-collapsed
}

/**
 * Browsing and DOM-query capability driven by one search task
 */
export interface IPageSession {
  navigate(url: string): Promise<void>;

  currentUrl(): string | null;

  title(): Promise<string>;

  /**
   * First element matched by the first selector that matches anything.
   * Invalid selectors are skipped.
   */
  findFirst(selectors: readonly string[], scope?: PageElement): Promise<PageElement | null>;

  /**
   * All elements of the first selector with a non-empty match
   */
  findAll(selectors: readonly string[], scope?: PageElement): Promise<PageElement[]>;

  /**
   * Attribute value; `href` and `src` come back as absolute URLs
   */
  attribute(element: PageElement, name: string): Promise<string | null>;

  /**
   * Returns whether the click had any effect
   */
  click(element: PageElement): Promise<boolean>;

  waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean>;

  /**
   * Idempotent; called on every exit path
   */
  close(): Promise<void>;
}

/**
 * Opens heavyweight page sessions. Rejections become SessionInitError.
 */
export interface IPageSessionFactory {
  open(): Promise<IPageSession>;
}

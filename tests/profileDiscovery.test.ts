import { ProfileDiscovery } from "../src/core/extraction/ProfileDiscovery.js";
import { IPageSession, PageElement } from "../src/core/interfaces/IPageSession.js";
import { HttpPageSession } from "../src/infrastructure/browser/HttpPageSession.js";
import { SITE, fakeFetcher, profilePage } from "./helpers/fakeWeb.js";

/**
 * Session whose only content is a "show more" button that stays clickable for
 * a fixed number of clicks
 */
class ShowMoreSession implements IPageSession {
  clicks = 0;
  private button: PageElement = { handle: 0, tagName: "button", text: "Show more" };

  constructor(
    private clickableTimes: number,
    private disabledAfter = Infinity
  ) {}

  async navigate(): Promise<void> {}
  currentUrl(): string | null {
    return `${SITE}/profile`;
  }
  async title(): Promise<string> {
    return "";
  }
  async findFirst(selectors: readonly string[]): Promise<PageElement | null> {
    return selectors.includes("#gsc_bpf_more") ? this.button : null;
  }
  async findAll(): Promise<PageElement[]> {
    return [];
  }
  async attribute(element: PageElement, name: string): Promise<string | null> {
    return name === "disabled" && this.clicks >= this.disabledAfter ? "" : null;
  }
  async click(): Promise<boolean> {
    if (this.clicks >= this.clickableTimes) {
      return false;
    }
    this.clicks++;
    return true;
  }
  async waitUntil(): Promise<boolean> {
    return true;
  }
  async close(): Promise<void> {}
}

describe("ProfileDiscovery", () => {
  const discovery = new ProfileDiscovery({ clickDelayMs: 0, maxShowMoreClicks: 5 });
  const profileUrl = `${SITE}/profile/ada`;

  async function sessionAt(body: string): Promise<HttpPageSession> {
    const session = new HttpPageSession(fakeFetcher({ [profileUrl]: body }));
    await session.navigate(profileUrl);
    return session;
  }

  describe("resolveSubjectName", () => {
    test("should read the name element", async () => {
      const session = await sessionAt(profilePage("Ada Placeholder", []));
      expect(await discovery.resolveSubjectName(session)).toBe("Ada Placeholder");
    });

    test("should fall back to the page title", async () => {
      const session = await sessionAt("<html><head><title>Bo Example - Profile</title></head><body></body></html>");
      expect(await discovery.resolveSubjectName(session)).toBe("Bo Example");
    });

    test("should return null when neither is usable", async () => {
      const session = await sessionAt("<html><head><title>Profile</title></head><body></body></html>");
      expect(await discovery.resolveSubjectName(session)).toBeNull();
    });
  });

  describe("collectItemUrls", () => {
    test("should return absolute item URLs in page order without duplicates", async () => {
      const session = await sessionAt(profilePage("Ada Placeholder", ["/item/a1", "/item/a2", "/item/a1"]));
      expect(await discovery.collectItemUrls(session)).toEqual([`${SITE}/item/a1`, `${SITE}/item/a2`]);
    });

    test("should return an empty list when there are no rows", async () => {
      const session = await sessionAt(profilePage("Ada Placeholder", []));
      expect(await discovery.collectItemUrls(session)).toEqual([]);
    });
  });

  describe("sortByYear", () => {
    test("should report false when there is no sort control", async () => {
      const session = await sessionAt(profilePage("Ada Placeholder", []));
      expect(await discovery.sortByYear(session)).toBe(false);
    });
  });

  describe("loadAllItems", () => {
    test("should click until the button stops doing anything", async () => {
      const session = new ShowMoreSession(3);
      expect(await discovery.loadAllItems(session)).toBe(3);
    });

    test("should stop at the click limit", async () => {
      const session = new ShowMoreSession(100);
      expect(await discovery.loadAllItems(session)).toBe(5);
    });

    test("should stop once the button is disabled", async () => {
      const session = new ShowMoreSession(100, 2);
      expect(await discovery.loadAllItems(session)).toBe(2);
    });

    test("should not click a non-link button over HTTP", async () => {
      const session = await sessionAt(
        `${profilePage("Ada Placeholder", [])}<button id="gsc_bpf_more" type="button">Show more</button>`
      );
      expect(await discovery.loadAllItems(session)).toBe(0);
    });
  });
});

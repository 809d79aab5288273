import type { Page } from "../content/types";

export interface NavItem {
  title: string;
  url: string;
  order: number;
}

export const SEARCH_NAV_ORDER = 0;

/**
 * Pages flagged show_in_nav, plus a Search entry when search is enabled,
 * ordered by (order, lowercased title)
 */
export function buildNavItems(pages: Page[], searchUrl: string | null): NavItem[] {
  const items: NavItem[] = pages
    .filter((page) => page.showInNav)
    .map((page) => ({
      title: page.navTitle ?? page.title,
      url: page.url,
      order: page.navOrder,
    }));

  if (searchUrl !== null) {
    items.push({ title: "Search", url: searchUrl, order: SEARCH_NAV_ORDER });
  }

  return items.sort((a, b) => {
    if (a.order !== b.order) return a.order - b.order;
    const aTitle = a.title.toLowerCase();
    const bTitle = b.title.toLowerCase();
    return aTitle < bTitle ? -1 : aTitle > bTitle ? 1 : 0;
  });
}

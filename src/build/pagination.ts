export interface Pagination {
  page: number;
  total_pages: number;
  prev_url: string | null;
  next_url: string | null;
}

export interface IndexPage<T> {
  number: number;
  url: string;
  items: T[];
  pagination: Pagination;
}

/** Page 1 is the site root, page N lives at /page/N/ */
export function indexPageUrl(page: number): string {
  return page <= 1 ? "/" : `/page/${page}/`;
}

export function countPages(itemCount: number, perPage: number): number {
  return Math.max(1, Math.ceil(itemCount / perPage));
}

/**
 * Split items into index pages. There is always at least one page.
 */
export function paginate<T>(items: T[], perPage: number): IndexPage<T>[] {
  const totalPages = countPages(items.length, perPage);
  const pages: IndexPage<T>[] = [];

  for (let page = 1; page <= totalPages; page++) {
    pages.push({
      number: page,
      url: indexPageUrl(page),
      items: items.slice((page - 1) * perPage, page * perPage),
      pagination: {
        page,
        total_pages: totalPages,
        prev_url: page > 1 ? indexPageUrl(page - 1) : null,
        next_url: page < totalPages ? indexPageUrl(page + 1) : null,
      },
    });
  }

  return pages;
}

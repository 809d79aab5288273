/**
 * Browser bundle written next to the index files as search.js.
 * The search page sets window.__PRESSMARK_SEARCH__ = { assetsBase, minTokenLength }.
 */
export function getSearchClientScript(): string {
  return `(() => {
  const TOKEN_RE = /[a-z0-9]+/g;
  const MAX_RESULTS = 20;

  function normalizeBase(value) {
    const parts = String(value || "").trim().split("/").filter(Boolean);
    return parts.length ? "/" + parts.join("/") : "";
  }

  function fetchJson(url) {
    return fetch(url, { cache: "no-cache" }).then((resp) => {
      if (!resp.ok) {
        throw new Error("Failed to load " + url + ": " + resp.status);
      }
      return resp.json();
    });
  }

  function tokenize(text, minLength) {
    if (!text) {
      return [];
    }
    const matches = text.toLowerCase().match(TOKEN_RE) || [];
    return matches.filter((token) => token.length >= minLength);
  }

  function renderMessage(container, message) {
    container.textContent = "";
    const p = document.createElement("p");
    p.textContent = message;
    container.appendChild(p);
  }

  const config = window.__PRESSMARK_SEARCH__ || {};
  const assetsBase = normalizeBase(config.assetsBase || "/assets/search");
  const minTokenLength = Number(config.minTokenLength) || 2;

  const input = document.getElementById("pm-search-input");
  const form = document.getElementById("pm-search-form");
  const results = document.getElementById("pm-search-results");

  if (!input || !form || !results) {
    console.warn("[pressmark] Search UI elements are missing.");
    return;
  }

  let docsById = new Map();
  let termsIndex = null;

  renderMessage(results, "Loading search index...");

  Promise.all([
    fetchJson(assetsBase + "/search_docs.json"),
    fetchJson(assetsBase + "/search_terms.json"),
  ])
    .then(([docs, terms]) => {
      docsById = new Map((docs.docs || []).map((doc) => [doc.id, doc]));
      termsIndex = terms;
      renderMessage(results, "Enter a search query to see results.");
    })
    .catch((error) => {
      console.error("[pressmark] Failed to load search index", error);
      renderMessage(results, "Search index failed to load.");
    });

  function renderResults(entries) {
    if (!entries.length) {
      renderMessage(results, "No matches found.");
      return;
    }
    const list = document.createElement("ul");
    list.className = "pm-search-results-list";
    for (const entry of entries.slice(0, MAX_RESULTS)) {
      const item = document.createElement("li");
      item.className = "pm-search-result";

      const link = document.createElement("a");
      link.href = entry.doc.url;
      link.textContent = entry.doc.title;
      item.appendChild(link);

      if (entry.doc.excerpt) {
        const excerpt = document.createElement("p");
        excerpt.className = "pm-search-result-excerpt";
        excerpt.textContent = entry.doc.excerpt;
        item.appendChild(excerpt);
      }
      list.appendChild(item);
    }
    results.textContent = "";
    results.appendChild(list);
  }

  function runSearch(query) {
    if (!termsIndex) {
      renderMessage(results, "Search index is still loading...");
      return;
    }
    const tokens = tokenize(query, minTokenLength);
    if (!tokens.length) {
      renderMessage(results, "Enter a search query to see results.");
      return;
    }

    const scores = new Map();
    for (const token of tokens) {
      const postings = Object.prototype.hasOwnProperty.call(termsIndex, token)
        ? termsIndex[token]
        : [];
      for (const [docId, score] of postings) {
        scores.set(docId, (scores.get(docId) || 0) + score);
      }
    }

    const entries = Array.from(scores.entries())
      .map(([docId, score]) => ({ doc: docsById.get(docId), score }))
      .filter((entry) => entry.doc)
      .sort((a, b) => (b.score === a.score ? a.doc.id - b.doc.id : b.score - a.score));

    renderResults(entries);
  }

  form.addEventListener("submit", (event) => {
    event.preventDefault();
    runSearch(input.value);
  });

  input.addEventListener("input", () => {
    runSearch(input.value);
  });
})();
`;
}

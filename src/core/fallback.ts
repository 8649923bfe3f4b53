// src/core/fallback.ts

/** Repository search on GitHub, offered when no package source had a match */
export function githubSearchUrl(query: string): string {
  return `https://github.com/search?${new URLSearchParams({ q: query, type: 'repositories' })}`
}

/**
 * Search-ready form of a paper title. The resolver matches quoted phrases
 * exactly, so separators and quotes become spaces.
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/[:\-"]/g, " ").split(/\s+/).filter(Boolean).join(" ");
}

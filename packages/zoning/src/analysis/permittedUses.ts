export type PermittedUseSummary = {
  residential: string[];
  commercial: string[];
  other: string[];
};

const RESIDENTIAL_TERMS = ["dwelling", "residential", "unit"];
const COMMERCIAL_TERMS = ["store", "commercial", "business", "occupation"];

/** `home_occupation` → `Home Occupation`. */
function toTitle(use: string): string {
  return use
    .replaceAll("_", " ")
    .toLowerCase()
    .replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}

/** Group use identifiers for display. */
export function summarizePermittedUses(uses: readonly string[]): PermittedUseSummary {
  const summary: PermittedUseSummary = { residential: [], commercial: [], other: [] };

  for (const use of uses) {
    const lower = use.toLowerCase();
    if (RESIDENTIAL_TERMS.some((term) => lower.includes(term))) {
      summary.residential.push(toTitle(use));
    } else if (COMMERCIAL_TERMS.some((term) => lower.includes(term))) {
      summary.commercial.push(toTitle(use));
    } else {
      summary.other.push(toTitle(use));
    }
  }

  return summary;
}

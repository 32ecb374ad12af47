export const CATEGORY_SOURCES = {
  world: ["apnews", "bbc", "reuters"],
  color: [
    "austinchronicle",
    "doorcountypulse",
    "urbanmilwaukee",
    "stlmag",
    "blockclubchicago",
    "gothamist",
    "303magazine",
    "iexaminer",
    "gambit",
    "slugmag",
    "folioweekly",
    "lataco",
    "miamiliving"
  ]
} as const satisfies Record<string, readonly string[]>;

export type Category = keyof typeof CATEGORY_SOURCES;

export const CATEGORIES: Category[] = Object.keys(CATEGORY_SOURCES).filter(isCategory);

/** Seen-set partition used when a client pulls from a single local source. */
export const SINGLE_SOURCE_CATEGORY: Category = "color";

export class UnknownCategoryError extends Error {
  constructor(readonly category: string) {
    super(`Invalid category: ${category}`);
    this.name = "UnknownCategoryError";
  }
}

export function isCategory(value: string): value is Category {
  return Object.prototype.hasOwnProperty.call(CATEGORY_SOURCES, value);
}

export function sourcesForCategory(category: string): readonly string[] {
  if (!isCategory(category)) {
    throw new UnknownCategoryError(category);
  }
  return CATEGORY_SOURCES[category];
}

export function categoryForSource(key: string): Category {
  const world: readonly string[] = CATEGORY_SOURCES.world;
  return world.includes(key.toLowerCase()) ? "world" : "color";
}

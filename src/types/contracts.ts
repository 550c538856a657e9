/** Source record exactly as the upstream catalog returned it. */
export type RawProduct = Record<string, unknown>;

export type OptionalNumber =
  | { kind: "present"; value: number }
  | { kind: "absent" };

export type FlatProduct = {
  name: string;
  brand: string;
  description: string;
  price: OptionalNumber;
  listPrice: OptionalNumber;
  score: OptionalNumber;
  images: string;
  productId: string;
  sourceUrl: string;
  badge: string;
  rankName: string;
  /** Candidate ingredient tokens joined with " | ". */
  ingredients: string;
  sizeVolume: string;
  /** Matched concern terms joined with " | ". */
  skinConcern: string;
  productLine: string;
  barcode: string;
};

export type ScoredProduct = {
  product: FlatProduct;
  score: number;
};

export type IngredientGroup = {
  /** Lower-cased canonical ingredient, the grouping key. */
  ingredient: string;
  label: string;
  totalProducts: number;
  ranked: ScoredProduct[];
};

export type GroupedRow = {
  keyIngredient: string;
  productRank: number;
  productName: string;
  brand: string;
  priceUsd: string;
  productScore: number;
};

export type SearchPage = {
  hits: unknown[];
  isFinished: boolean;
};

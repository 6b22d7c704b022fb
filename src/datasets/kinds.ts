export const DATASETS = ["series", "populaires"] as const;

export type DatasetKind = (typeof DATASETS)[number];

export function isDatasetKind(value: unknown): value is DatasetKind {
  return typeof value === "string" && (DATASETS as readonly string[]).includes(value);
}

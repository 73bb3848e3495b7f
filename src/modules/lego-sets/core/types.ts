import { type Static, Type } from '@sinclair/typebox';

/**
 * How a set is sold. Values match the strings used in the dataset file.
 */
export const PackagingTypeSchema = Type.Union([
  Type.Literal('Box'),
  Type.Literal('Polybag'),
  Type.Literal('Blister pack'),
  Type.Literal('Foil pack'),
  Type.Literal('Bucket'),
  Type.Literal('Tub'),
  Type.Literal('Canister'),
  Type.Literal('Other'),
  Type.Literal('Not specified'),
]);

export type PackagingType = Static<typeof PackagingTypeSchema>;

export const LegoSetSchema = Type.Object({
  number: Type.String({ minLength: 1, description: 'Catalog number, e.g. 75192-1' }),
  name: Type.String({ minLength: 1 }),
  theme: Type.String(),
  subtheme: Type.Union([Type.String(), Type.Null()]),
  // null means "no tag data"; [] means "tagged with nothing"
  tags: Type.Union([Type.Array(Type.String()), Type.Null()]),
  pieces: Type.Integer({ minimum: 0 }),
  packagingType: PackagingTypeSchema,
  year: Type.Optional(Type.Integer()),
  minifigs: Type.Optional(Type.Integer({ minimum: 0 })),
});

export type LegoSet = Static<typeof LegoSetSchema>;

export const BRICKSET_RESOURCE = 'brickset.json';

/**
 * One titled block of the printed report.
 */
export interface ReportSection {
  title: string;
  lines: string[];
}

export interface ReportOptions {
  /** Name prefix for the starts-with section. */
  prefix: string;
  /** Tag-count ceiling for the catalog number section. */
  maxTags: number;
  /** Piece ceiling for the all-sets-within-limit section. */
  pieceLimit: number;
}

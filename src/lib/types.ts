import type { Feature, MultiPolygon, Polygon, Position } from 'geojson';

export type Scalar = string | number | boolean | null;

export type Properties = Record<string, Scalar>;

export type Areal = Polygon | MultiPolygon;

export type BBox = [number, number, number, number]; // [west, south, east, north]

export type AreaOfInterest = Position[];

export type TileProperties = {
  tile_index: number;
  row: number;
  col: number;
};

export type Tile = Feature<Areal, TileProperties>;

export type SiteProperties = {
  mean_ndvi: number | null;
  mean_elev: number | null;
  area_m2: number;
  tile_index: number;
};

export type CandidateSite = Feature<Polygon, SiteProperties>;

export type CellProperties = Properties & {
  site_index: number;
  subcell_id: number;
};

export type AnalysisCell = Feature<Areal, CellProperties>;

/**
 * Any feature that can pass through the scorer. Geometry is kept so that the
 * shortlist can be written back out as a table.
 */
export type RecordFeature = Feature<Areal, Properties>;

export type WeightTable = Record<string, number>;

export type ScoredRecord = {
  feature: RecordFeature;
  /** Position in the record set handed to the scorer, used for stable ties */
  index: number;
  zScores: Record<string, number>;
  score: number;
};

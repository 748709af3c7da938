import fs from 'fs/promises';
import path from 'path';
import { fromFile } from 'geotiff';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { RasterCatalogue, RasterGrid } from './grid';

// ==========================================
// SCHEMA
// ==========================================

const RasterFileSchema = z.object({
  path: z.string().min(1),
  /** Band names in file order */
  bands: z.array(z.string().min(1)).min(1),
});

const SceneFileSchema = RasterFileSchema.extend({
  id: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD'),
  cloudPercent: z.number().min(0).max(100),
});

export const CatalogueFileSchema = z.object({
  collections: z.record(z.array(SceneFileSchema)),
  images: z.record(RasterFileSchema),
});

export type CatalogueFile = z.infer<typeof CatalogueFileSchema>;

// ==========================================
// LOADING
// ==========================================

/**
 * Read a GeoTIFF in EPSG:4326 into a grid, mapping its samples to the given
 * band names and its no-data value to NaN.
 */
export async function readGeoTiff(filePath: string, bandNames: string[]): Promise<RasterGrid> {
  const tiff = await fromFile(filePath);
  const image = await tiff.getImage();
  const rasters = await image.readRasters();
  const width = image.getWidth();
  const height = image.getHeight();
  const [west, south, east, north] = image.getBoundingBox();
  const noData = image.getGDALNoData();

  if (!Array.isArray(rasters) || rasters.length < bandNames.length) {
    throw new ConfigurationError(
      `${filePath} has ${Array.isArray(rasters) ? rasters.length : 0} band(s), catalogue names ${bandNames.length}`
    );
  }

  const bands: Record<string, Float64Array> = {};
  bandNames.forEach((name, i) => {
    const values = Float64Array.from(rasters[i]);
    if (noData !== null) {
      for (let j = 0; j < values.length; j++) {
        if (values[j] === noData) values[j] = NaN;
      }
    }
    bands[name] = values;
  });

  console.log(`[Catalogue] ${path.basename(filePath)}: ${width}x${height}, ${bandNames.join('/')}`);
  return { width, height, bbox: [west, south, east, north], bands };
}

export async function loadCatalogue(catalogueFile: string): Promise<RasterCatalogue> {
  const raw: unknown = JSON.parse(await fs.readFile(catalogueFile, 'utf-8'));
  const parsed = CatalogueFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid raster catalogue ${catalogueFile}: ${parsed.error.message}`);
  }
  const baseDir = path.dirname(catalogueFile);
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.join(baseDir, p));

  const catalogue: RasterCatalogue = { collections: {}, images: {} };
  for (const [name, scenes] of Object.entries(parsed.data.collections)) {
    catalogue.collections[name] = await Promise.all(
      scenes.map(async (scene) => ({
        id: scene.id,
        date: scene.date,
        cloudPercent: scene.cloudPercent,
        grid: await readGeoTiff(resolve(scene.path), scene.bands),
      }))
    );
  }
  for (const [name, image] of Object.entries(parsed.data.images)) {
    catalogue.images[name] = await readGeoTiff(resolve(image.path), image.bands);
  }
  return catalogue;
}

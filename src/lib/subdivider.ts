import { bboxOf, gridCells, intersect, metresToDegrees, rectangle } from './geometry';
import type { AnalysisCell, Areal, Properties, RecordFeature } from './types';

/**
 * Cut a site into `cellSizeM` × `cellSizeM` cells clipped to the site. The
 * grid is anchored at the site's south-west bbox corner and sized in degrees
 * at the bbox's centre latitude.
 */
export function subdivideSite(geometry: Areal, cellSizeM: number): Areal[] {
  if (!(cellSizeM > 0)) {
    throw new RangeError(`Cell size must be positive (got ${cellSizeM})`);
  }
  const bbox = bboxOf(geometry);
  const { dLon, dLat } = metresToDegrees(cellSizeM, (bbox[1] + bbox[3]) / 2);

  const cells: Areal[] = [];
  for (const cell of gridCells(bbox, dLon, dLat)) {
    const clipped = intersect(rectangle(cell.bbox), geometry);
    if (clipped) cells.push(clipped);
  }
  return cells;
}

/**
 * Subdivide every site, tagging cells with the site's position in `sites`
 * and a per-site cell id. Site metrics ride along with a `site_` prefix.
 */
export function subdivideSites(sites: RecordFeature[], cellSizeM: number): AnalysisCell[] {
  const cells: AnalysisCell[] = [];
  sites.forEach((site, siteIndex) => {
    const carried: Properties = {};
    for (const [key, value] of Object.entries(site.properties)) {
      carried[`site_${key}`] = value;
    }
    const parts = subdivideSite(site.geometry, cellSizeM);
    console.log(`[Subdivider] Site ${siteIndex + 1}: ${parts.length} subcells`);
    parts.forEach((geometry, subcellId) => {
      cells.push({
        type: 'Feature',
        geometry,
        properties: { ...carried, site_index: siteIndex, subcell_id: subcellId },
      });
    });
  });
  console.log(`[Subdivider] Total subcells: ${cells.length}`);
  return cells;
}

import { logErrorDetails } from './errors';
import type { AdvisoryPool } from './pool';
import type { RecordFeature, Scalar } from './types';

export const ADVICE_ERROR = '<error>';

function fixed(value: Scalar | undefined, digits: number): string {
  return typeof value === 'number' && Number.isFinite(value) ? value.toFixed(digits) : 'n/a';
}

export function buildSitePrompt(site: RecordFeature, position: number): string {
  const { mean_ndvi, mean_elev, compactness } = site.properties;
  return `
Site ${position}:
  - Mean NDVI: ${fixed(mean_ndvi, 3)}
  - Mean Elevation: ${fixed(mean_elev, 1)} m
  - Compactness: ${fixed(compactness, 3)}

You are an expert in archaeology and remote sensing. Based on the above metrics for a site within the Amazon region, evaluate its potential as an archaeological site.

Please:
  1. Provide your reasoning based on elevation, NDVI, and compactness.
  2. Rate the site's archaeological potential on a scale of 1 to 10 (1 = very unlikely, 10 = highly likely).
  3. Give a brief summary of key considerations.
`;
}

/**
 * Ask the model about each site. A site whose request fails for good is
 * marked with ADVICE_ERROR and the rest carry on.
 */
export async function adviseSites(pool: AdvisoryPool, sites: RecordFeature[]): Promise<RecordFeature[]> {
  if (sites.length === 0) {
    console.warn('[Advisor] ⚠️ No sites to evaluate.');
    return [];
  }
  console.log(`[Advisor] Evaluating ${sites.length} sites...`);

  return Promise.all(
    sites.map(async (site, i): Promise<RecordFeature> => {
      try {
        const advice = await pool.generateAdvice(buildSitePrompt(site, i + 1));
        console.log(`[Advisor] Site ${i + 1} advice received (rating ${advice.rating}/10)`);
        return {
          ...site,
          properties: {
            ...site.properties,
            advice: advice.reasoning,
            advice_rating: advice.rating,
            advice_summary: advice.summary,
          },
        };
      } catch (error) {
        logErrorDetails(`[Advisor] ❌ Failed advice for site ${i + 1}. `, error);
        return {
          ...site,
          properties: { ...site.properties, advice: ADVICE_ERROR, advice_rating: null, advice_summary: null },
        };
      }
    })
  );
}

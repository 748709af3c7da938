/**
 * Small argv helpers shared by the scripts under scripts/.
 * Bad input prints a message and exits with status 1.
 */
import fs from 'fs';

export function fail(message: string): never {
  console.error(`❌ ${message}`);
  process.exit(1);
}

export function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || (value.startsWith('-') && !/^-\d/.test(value))) {
    fail(`Missing value for ${flag}`);
  }
  return value;
}

export function requireNumber(
  args: string[],
  index: number,
  flag: string,
  range: { min?: number; max?: number; integer?: boolean } = {}
): number {
  const raw = requireValue(args, index, flag);
  const value = Number(raw);
  const { min = -Infinity, max = Infinity, integer = false } = range;
  if (!Number.isFinite(value) || value < min || value > max || (integer && !Number.isInteger(value))) {
    const bounds = [Number.isFinite(min) ? `>= ${min}` : '', Number.isFinite(max) ? `<= ${max}` : '']
      .filter(Boolean)
      .join(', ');
    fail(`Invalid value for ${flag}: ${raw}${bounds ? ` (must be ${bounds})` : ''}`);
  }
  return value;
}

/** Exit unless every output is absent or --force was given */
export function guardOutputs(paths: string[], force: boolean): void {
  const existing = paths.filter((p) => fs.existsSync(p));
  if (existing.length > 0 && !force) {
    console.error(`❌ Output files already exist:`);
    for (const p of existing) {
      console.error(`   - ${p}`);
    }
    console.error(`   Use --force to overwrite.`);
    process.exit(1);
  }
}

export function reportFatal(error: unknown): never {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}

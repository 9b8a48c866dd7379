import { existsSync, mkdirSync, readdirSync, renameSync } from 'fs';
import { basename, join, resolve } from 'path';
import { STATES_DIR } from '../config/catalogConfig.js';

/**
 * True for `<regionCode>-XX.csv`, XX being any two characters.
 * Purely structural: XX is not checked against a list of real subdivisions.
 */
export function isStateReportName(filename: string, regionCode: string): boolean {
  if (!filename.endsWith('.csv')) return false;
  const parts = filename.slice(0, -'.csv'.length).split('-');
  return parts.length === 2 && parts[0] === regionCode && parts[1].length === 2;
}

/**
 * Move a region's subdivision reports into `<region>/states/`.
 * Returns the moved file names; an older copy in states/ is replaced.
 */
export function archiveStateReports(regionPath: string): string[] {
  if (!existsSync(regionPath)) return [];

  const regionCode = basename(resolve(regionPath));
  const stateReports = readdirSync(regionPath, { withFileTypes: true })
    .filter(d => d.isFile() && isStateReportName(d.name, regionCode))
    .map(d => d.name)
    .sort();

  if (stateReports.length === 0) return [];

  const statesPath = join(regionPath, STATES_DIR);
  mkdirSync(statesPath, { recursive: true });

  for (const filename of stateReports) {
    renameSync(join(regionPath, filename), join(statesPath, filename));
    console.log(`  📦 Archived: ${filename} → ${STATES_DIR}/${filename}`);
  }
  return stateReports;
}

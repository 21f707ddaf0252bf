import { IP_OPENINGS_IGNORED_FROM } from './ThermalSolverModule';

/**
 * Manufacturer louvre: the drawn outline used to lay the grid out on a
 * section door, and the free inlet area it is rated for.
 */
export interface LouvreDefinitionV1 {
  /** Free inlet area of one louvre before any IP mesh (cm²). */
  inletAreaCm2: number;
  drawWidthMm: number;
  drawHeightMm: number;
  /** Clear margin between the grid and the section edge (mm). */
  edgeMarginMm: number;
  /** Gap between neighbouring louvres (mm). */
  louvreSpacingMm: number;
}

export const DEFAULT_LOUVRE_DEFINITION: LouvreDefinitionV1 = {
  inletAreaCm2: 10,
  drawWidthMm: 100,
  drawHeightMm: 25,
  edgeMarginMm: 50,
  louvreSpacingMm: 20,
};

/**
 * Open-area fraction left by the insect / finger mesh an IP rating requires.
 *
 *   IP2X  no mesh                1.00
 *   IP3X  Ø2.5 mm probe mesh     0.65
 *   IP4X  Ø1.0 mm wire mesh      0.45
 *   IP5X+ openings not allowed   0
 */
export const IP_MESH_OPEN_AREA: Readonly<Partial<Record<number, number>>> = {
  2: 1.0,
  3: 0.65,
  4: 0.45,
};

/** A section's louvre layout: `rows` is the bottom block; the top block carries one extra chimney row. */
export interface VentGridV1 {
  enabled: boolean;
  cols: number;
  rows: number;
}

export function ipOpenAreaFactor(ipRating: number): number {
  if (ipRating >= IP_OPENINGS_IGNORED_FROM) return 0;
  return IP_MESH_OPEN_AREA[Math.floor(ipRating)] ?? 1.0;
}

export function validateLouvreDefinition(def: LouvreDefinitionV1): void {
  const positive: Array<[keyof LouvreDefinitionV1, number]> = [
    ['inletAreaCm2', def.inletAreaCm2],
    ['drawWidthMm', def.drawWidthMm],
    ['drawHeightMm', def.drawHeightMm],
  ];
  for (const [field, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) throw new Error(`louvre.${field} must be > 0 (got ${value})`);
  }
  const nonNegative: Array<[keyof LouvreDefinitionV1, number]> = [
    ['edgeMarginMm', def.edgeMarginMm],
    ['louvreSpacingMm', def.louvreSpacingMm],
  ];
  for (const [field, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) throw new Error(`louvre.${field} must be ≥ 0 (got ${value})`);
  }
}

/** Free inlet area of one louvre after the IP mesh (cm²). */
export function effectiveLouvreAreaCm2(def: LouvreDefinitionV1, ipRating: number): number {
  return def.inletAreaCm2 * ipOpenAreaFactor(ipRating);
}

/** Louvres in a grid: bottom block of `rows`, top block of `rows + 1`. */
export function louvreCount(cols: number, rows: number): number {
  const c = Math.max(1, Math.floor(cols));
  const r = Math.max(1, Math.floor(rows));
  return c * (2 * r + 1);
}

/** Effective inlet area of the section's current vent grid (cm²). */
export function sectionInletAreaCm2(grid: VentGridV1, def: LouvreDefinitionV1, ipRating: number): number {
  if (!grid.enabled || ipRating >= IP_OPENINGS_IGNORED_FROM) return 0;
  return louvreCount(grid.cols, grid.rows) * effectiveLouvreAreaCm2(def, ipRating);
}

/**
 * Largest grid that fits the section door.  Columns span the width inside
 * the edge margins; the bottom block may use the lowest quarter of the
 * height.  Never less than one row and one column.
 */
export function maxLouvreGrid(widthM: number, heightM: number, def: LouvreDefinitionV1): { cols: number; rows: number } {
  const widthMm = widthM * 1000;
  const heightMm = heightM * 1000;
  const pitchX = def.drawWidthMm + def.louvreSpacingMm;
  const pitchY = def.drawHeightMm + def.louvreSpacingMm;

  const cols = Math.floor((widthMm - 2 * def.edgeMarginMm + def.louvreSpacingMm) / pitchX);
  const rows = Math.floor((heightMm / 4 - def.edgeMarginMm + def.louvreSpacingMm) / pitchY);
  return { cols: Math.max(1, cols), rows: Math.max(1, rows) };
}

/** Effective inlet area of the largest grid the section can take (cm²). */
export function maxSectionInletAreaCm2(
  widthM: number,
  heightM: number,
  def: LouvreDefinitionV1,
  ipRating: number,
): number {
  if (ipRating >= IP_OPENINGS_IGNORED_FROM) return 0;
  const { cols, rows } = maxLouvreGrid(widthM, heightM, def);
  return louvreCount(cols, rows) * effectiveLouvreAreaCm2(def, ipRating);
}

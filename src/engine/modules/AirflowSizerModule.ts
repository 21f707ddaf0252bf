import { interpolateTable } from '../utils/numeric';

/** Volumetric heat capacity of dry air at sea level (ρ·cp ≈ 1.16 kg/m³ × 1000 J/kgK). */
export const SEA_LEVEL_VOLUMETRIC_HEAT_CAPACITY_J_M3K = 1160;

const SECONDS_PER_HOUR = 3600;

/**
 * Air density ratio against sea level, used to derate both the heat an
 * airflow can carry and the heat the enclosure surface can shed by natural
 * convection.  Linear between rows, clamped outside 0–3000 m.
 */
export const ALTITUDE_DERATE_TABLE: ReadonlyArray<readonly [altitudeM: number, factor: number]> = [
  [0, 1.0],
  [500, 0.95],
  [1000, 0.89],
  [1500, 0.84],
  [2000, 0.79],
  [2500, 0.75],
  [3000, 0.71],
];

export function altitudeDerateFactor(altitudeM: number): number {
  return interpolateTable(ALTITUDE_DERATE_TABLE, altitudeM);
}

export function volumetricHeatCapacityAt(
  altitudeM: number,
  seaLevelJm3K: number = SEA_LEVEL_VOLUMETRIC_HEAT_CAPACITY_J_M3K,
): number {
  return seaLevelJm3K * altitudeDerateFactor(altitudeM);
}

/**
 * Forced airflow needed to carry `powerW` away with an air temperature rise
 * of `allowedRiseK`:
 *
 *   V̇ [m³/h] = P / (ρc · ΔT) × 3600
 *
 * @returns 0 when there is nothing to remove, `null` when ΔT ≤ 0 (no airflow
 *          can hold the limit: the ambient is already there).
 */
export function requiredFlowM3h(
  powerW: number,
  allowedRiseK: number,
  volumetricHeatCapacityJm3K: number = SEA_LEVEL_VOLUMETRIC_HEAT_CAPACITY_J_M3K,
): number | null {
  if (allowedRiseK <= 0) return null;
  if (powerW <= 0) return 0;
  return (powerW / (volumetricHeatCapacityJm3K * allowedRiseK)) * SECONDS_PER_HOUR;
}

import type { CoefficientFunctionId, CoefficientSource } from '../../modules/CoefficientSource';
import type { CoefficientLookup } from '../../schema/ThermalSchemaV1';

const DEFAULT_VALUES: Record<CoefficientFunctionId, number> = {
  kUnventilatedLarge: 0.2,
  cUnventilatedLarge: 1.5,
  kUnventilatedSmall: 0.5,
  cUnventilatedSmall: 1.2,
  kVentilated: 0.1,
  cVentilated: 1.4,
};

/** Coefficient source returning fixed values, so expected rises can be written by hand. */
export function constantCoefficientSource(
  overrides: Partial<Record<CoefficientFunctionId, number>> = {},
): CoefficientSource {
  const values = { ...DEFAULT_VALUES, ...overrides };
  const lookup = (id: CoefficientFunctionId): CoefficientLookup => ({ value: values[id], snaps: [] });
  return {
    strategies: {
      kUnventilatedLarge: 'closed_form',
      cUnventilatedLarge: 'closed_form',
      kUnventilatedSmall: 'closed_form',
      cUnventilatedSmall: 'closed_form',
      kVentilated: 'closed_form',
      cVentilated: 'closed_form',
    },
    kUnventilatedLarge: () => lookup('kUnventilatedLarge'),
    cUnventilatedLarge: () => lookup('cUnventilatedLarge'),
    kUnventilatedSmall: () => lookup('kUnventilatedSmall'),
    cUnventilatedSmall: () => lookup('cUnventilatedSmall'),
    kVentilated: () => lookup('kVentilated'),
    cVentilated: () => lookup('cVentilated'),
  };
}

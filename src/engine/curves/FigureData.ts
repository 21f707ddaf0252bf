import rawFigures from './data/iec60890-figures.json';
import { loadFigureDataSet } from './CurveLoader';
import type { FigureDataSetV1 } from '../schema/ThermalSchemaV1';

/**
 * Bundled digitized readings of IEC 60890 Figures 3–7.
 *
 * Validated once when the module is first imported; the maps and arrays are
 * never mutated afterwards.
 */
export const DEFAULT_FIGURE_DATA: FigureDataSetV1 = loadFigureDataSet(rawFigures);

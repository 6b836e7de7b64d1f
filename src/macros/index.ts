export { MacroAccumulator, emptyTotals, scaleRecord, formatTotals } from './accumulator.js';

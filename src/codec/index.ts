/**
 * Codec module exports
 */

export { encodeCalendar, DEFAULT_PRODUCT_ID, type EncodeOptions } from './encoder.js';
export { decodeCalendar, type DecodeOptions } from './decoder.js';
export { buildDayIndex, eventsForDay, sliceDayIndex, type DayIndexOptions } from './dayIndex.js';

/**
 * Vision Templates
 */

export { REFERENCE_RATES_TEMPLATE, PAGE_INTERPRETATION_SCHEMA } from './reference-rates.template';
export type { VisionTemplate } from './types';

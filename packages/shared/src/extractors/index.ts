/**
 * Document Extractors
 */

export * from './reference-rates';

/**
 * Forex Card Rate Sheet Vision Template
 *
 * Page semantics:
 * - The disclosure page says the rates are "to be used as reference rates"
 * - First column holds pairs like "USD/INR"; the model returns the ISO code only
 * - Eight rate columns follow, in the order of RATE_COLUMNS
 * - Date and time of publishing appear in the page header
 */

import type { VisionTemplate } from './types';

export const REFERENCE_RATES_TEMPLATE: VisionTemplate = {
  description: 'Forex card rate sheet page - disclosure flag, column headers, publication date/time, rate rows',

  userPrompt:
    'Analyze this image. Check whether it contains the text "be used as reference rates". ' +
    'Parse out the 3-letter ISO currency code from the second column. For instance `USD` from `USD/INR`. ' +
    'Provide a JSON response like the following structure:' +
    '{"has_reference_rates": true or false, "headers": [<list of column headers>], ' +
    '"date": "<date as DD-MM-YYYY>", "time": "<time of publishing in HH:MM AM/PM format>", ' +
    '"forex_rates": [{"currency_code": "<currency short code>","rates": [83.57, 84.42, 83.50, 84.59, 83.50, 84.59, 82.55, 84.90]}]}',
};

/**
 * JSON Schema for OpenAI Structured Outputs
 */
export const PAGE_INTERPRETATION_SCHEMA = {
  name: 'forex_rate_page',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['has_reference_rates', 'headers', 'date', 'time', 'forex_rates'],
    properties: {
      has_reference_rates: {
        type: 'boolean',
        description: 'Whether the page contains the text "be used as reference rates"',
      },
      headers: {
        type: 'array',
        description: 'Column headers of the rate table, left to right',
        items: { type: 'string' },
      },
      date: {
        type: 'string',
        description: 'Publication date as DD-MM-YYYY',
      },
      time: {
        type: 'string',
        description: 'Publication time as HH:MM AM/PM',
      },
      forex_rates: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['currency_code', 'rates'],
          properties: {
            currency_code: { type: 'string' },
            rates: { type: 'array', items: { type: 'number' } },
          },
        },
      },
    },
  },
} as const;

/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Document source
  forexPdfUrl: string;
  forexPdfMirrorUrl: string;
  fetchTimeoutMs: number;

  // Proxy fallback
  proxyAttempts: number;
  proxyListUrl: string;
  proxyListTimeoutMs: number;

  // Output
  csvDir: string;
  pdfDir: string;
  pdfLinkBase: string;

  // LLM (image fallback only)
  llmModelVision: string;
  llmRequestTimeoutMs: number;
  openaiApiKey: string;
  renderMaxDimension: number;

  // Metrics
  metricsFile: string;
}

export const config: Config = {
  // Document source
  forexPdfUrl:
    process.env.FOREX_PDF_URL || 'https://www.sbi.co.in/documents/16012/1400784/FOREX_CARD_RATES.pdf',
  forexPdfMirrorUrl:
    process.env.FOREX_PDF_MIRROR_URL || 'https://bank.sbi/documents/16012/1400784/FOREX_CARD_RATES.pdf',
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || '10000', 10),

  // Proxy fallback
  proxyAttempts: parseInt(process.env.PROXY_ATTEMPTS || '5', 10),
  proxyListUrl:
    process.env.PROXY_LIST_URL ||
    'https://api.proxyscrape.com/v2/?request=displayproxies&protocol=http&timeout=1000&country=all&ssl=yes&anonymity=elite',
  proxyListTimeoutMs: parseInt(process.env.PROXY_LIST_TIMEOUT_MS || '5000', 10),

  // Output
  csvDir: process.env.CSV_DIR || 'csv_files',
  pdfDir: process.env.PDF_DIR || 'pdf_files',
  pdfLinkBase: process.env.PDF_LINK_BASE || 'pdf_files',

  // LLM (image fallback only)
  llmModelVision: process.env.LLM_MODEL_VISION || 'gpt-4o-mini',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  renderMaxDimension: parseInt(process.env.RENDER_MAX_DIMENSION || '2000', 10),

  // Metrics
  metricsFile: process.env.METRICS_FILE || '',
};

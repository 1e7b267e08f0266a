import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { metricCount, type GatherRequest, type SourceRegistry } from './registry.js';

export interface GatherResult {
  source: string;
  success: boolean;
  /** Empty unless success */
  markdown: string;
  metric_count: number;
  /** Present only on failure */
  error?: string;
}

export function failedResult(source: string, error: string): GatherResult {
  return { source, success: false, markdown: '', metric_count: 0, error };
}

/**
 * Run one source. Never throws: an unregistered name fails without any
 * call, and a fault from the handler becomes a failed result.
 */
export async function runSource(
  registry: SourceRegistry,
  source: string,
  request: GatherRequest,
  logger: Logger = silentLogger
): Promise<GatherResult> {
  if (!registry.has(source)) {
    return failedResult(source, `Unknown source: ${source}`);
  }

  try {
    const output = await registry.run(source, request);
    return {
      source,
      success: true,
      markdown: output.markdown,
      metric_count: metricCount(output),
    };
  } catch (err) {
    const message = errorMessage(err);
    logger.warn({ source, ticker: request.ticker, err: message }, 'source gather failed');
    return failedResult(source, message);
  }
}

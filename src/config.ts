/**
 * Load a configuration file and parse it, logging where parsing failed.
 */

import { initialize, type ConfDocument, type InitializeOptions } from './document.js';
import { ConfParseError } from './errors.js';
import { loadFile, loadFileSync, resolvePath, type LoadOptions } from './loader.js';
import { Logger } from './logger.js';

export interface LoadConfigOptions extends LoadOptions, InitializeOptions {
  logger?: Logger;
}

function parseLogged(
  file: string,
  data: Uint8Array,
  options: LoadConfigOptions,
  logger: Logger
): ConfDocument {
  try {
    const doc = initialize(data, options);
    logger.debug('Configuration loaded', { file, sections: doc.sections.length });
    if (doc.sections.length === 0) logger.warn('Configuration has no sections', { file });
    if (doc.environment !== undefined) {
      logger.info('Environment selected', { file, environment: doc.environment });
    }
    return doc;
  } catch (err) {
    if (err instanceof ConfParseError) {
      logger.error(`${err.code}: ${err.message}`, {
        file,
        line: err.position?.line,
        column: err.position?.column,
        excerpt: err.excerpt,
      });
    }
    throw err;
  }
}

export async function loadConfig(
  path: string,
  options: LoadConfigOptions = {}
): Promise<ConfDocument> {
  const logger = options.logger ?? new Logger();
  const file = resolvePath(path, options.baseDir);
  logger.trace('Reading configuration', { file });
  const data = await loadFile(file, options);
  return parseLogged(file, data, options, logger);
}

export function loadConfigSync(path: string, options: LoadConfigOptions = {}): ConfDocument {
  const logger = options.logger ?? new Logger();
  const file = resolvePath(path, options.baseDir);
  logger.trace('Reading configuration', { file });
  const data = loadFileSync(file, options);
  return parseLogged(file, data, options, logger);
}

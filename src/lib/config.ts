import type { AnnotateConfig, DescriptionMode, LogFormat } from './types.js';
import { UsageError } from './errors.js';

export const ANNOTATE_DEFAULTS: AnnotateConfig = {
  toolName: 'gpx-annotate',
  descriptionMode: 'replace',     // 'append' keeps an existing <desc> text
  logFormat: 'text',
  debug: false,
};

const DESCRIPTION_MODES: readonly DescriptionMode[] = ['replace', 'append'];
const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

function oneOf<T extends string>(variable: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find(option => option === value.trim().toLowerCase());
  if (match === undefined) {
    throw new UsageError(`${variable} must be one of ${allowed.join(', ')} (got \`${value}')`);
  }
  return match;
}

function parseFlag(variable: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '':
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new UsageError(`${variable} must be a boolean (got \`${value}')`);
  }
}

/**
 * Overlay GPX_ANNOTATE_* environment variables on the defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnnotateConfig {
  const config: AnnotateConfig = { ...ANNOTATE_DEFAULTS };

  const toolName = env.GPX_ANNOTATE_TOOL_NAME?.trim();
  if (toolName) {
    config.toolName = toolName;
  }
  if (env.GPX_ANNOTATE_DESCRIPTION_MODE !== undefined) {
    config.descriptionMode = oneOf('GPX_ANNOTATE_DESCRIPTION_MODE', env.GPX_ANNOTATE_DESCRIPTION_MODE, DESCRIPTION_MODES);
  }
  if (env.GPX_ANNOTATE_LOG_FORMAT !== undefined) {
    config.logFormat = oneOf('GPX_ANNOTATE_LOG_FORMAT', env.GPX_ANNOTATE_LOG_FORMAT, LOG_FORMATS);
  }
  if (env.GPX_ANNOTATE_DEBUG !== undefined) {
    config.debug = parseFlag('GPX_ANNOTATE_DEBUG', env.GPX_ANNOTATE_DEBUG);
  }

  return config;
}

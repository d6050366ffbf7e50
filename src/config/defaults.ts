import { DEFAULT_INDENT } from '../constants.js';
import type { GeneratorConfig } from './types.js';

export const DEFAULT_CONFIG: GeneratorConfig = {
  indent: DEFAULT_INDENT,
  header: true,
  sectionComments: true,
  timestamp: false,
};

export function getDefaultConfig(): GeneratorConfig {
  return { ...DEFAULT_CONFIG };
}

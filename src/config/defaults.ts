import { MaskerConfig } from './types';

export const DEFAULT_CONFIG: Readonly<MaskerConfig> = {
  maskChar: '*',
  defaultStrategy: 'full',
  skipComments: true,
  patterns: {},
  sources: {},
  strategies: {},
  envFilePatterns: ['.env', '.env.*', '*.env'],
  cacheCapacity: 200,
  debounceMs: 150,
  peekDurationMs: 3000,
};

export function buildSampleConfig(): string {
  return `# envshroud configuration
maskChar: "*"
defaultStrategy: full
skipComments: true
patterns:
  "*_PUBLIC": none
  "*_TOKEN": partial
sources:
  .env.example: none
strategies:
  partial:
    show_start: 3
    show_end: 3
    min_mask: 3
    fallback_mode: full
envFilePatterns:
  - .env
  - .env.*
  - "*.env"
cacheCapacity: 200
debounceMs: 150
peekDurationMs: 3000
profiles:
  ci:
    defaultStrategy: full
    patterns:
      "*_PUBLIC": full
`;
}

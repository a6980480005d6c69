import { numberOption, stringOption } from '../strategy';
import { StrategyDefinition } from '../types';
import { maskFull } from './full';

export const PARTIAL_FALLBACKS = ['full', 'none'] as const;

export const partialStrategy: StrategyDefinition = {
  name: 'partial',
  description: 'Show leading and trailing characters, mask the middle',
  schema: {
    mask_char: {
      kind: 'string',
      default: '*',
      minLength: 1,
      maxLength: 1,
      description: 'Character used for masking',
    },
    show_start: {
      kind: 'number',
      default: 3,
      min: 0,
      integer: true,
      description: 'Characters left visible at the start',
    },
    show_end: {
      kind: 'number',
      default: 3,
      min: 0,
      integer: true,
      description: 'Characters left visible at the end',
    },
    min_mask: {
      kind: 'number',
      default: 3,
      min: 1,
      integer: true,
      description: 'Minimum number of masked characters before partial masking applies',
    },
    fallback_mode: {
      kind: 'enumeration',
      values: PARTIAL_FALLBACKS,
      default: 'full',
      description: 'Strategy used when the value is too short',
    },
  },
  apply(value, context, strategy) {
    const maskChar = stringOption(strategy, 'mask_char', '*');
    const showStart = numberOption(strategy, 'show_start', 3);
    const showEnd = numberOption(strategy, 'show_end', 3);
    const minMask = numberOption(strategy, 'min_mask', 3);

    if (value.length < showStart + showEnd + minMask) {
      const fallback = stringOption(strategy, 'fallback_mode', 'full');
      context.report?.({ strategy: strategy.name, reason: 'value-too-short', fallback, key: context.key });
      return fallback === 'none' ? value : maskFull(value, maskChar);
    }

    const masked = maskChar.repeat(value.length - showStart - showEnd);
    return value.slice(0, showStart) + masked + value.slice(value.length - showEnd);
  },
};

import { optionalNumberOption, stringOption } from '../strategy';
import { StrategyDefinition } from '../types';

export function maskFull(value: string, maskChar: string): string {
  return maskChar.repeat(value.length);
}

export const fullStrategy: StrategyDefinition = {
  name: 'full',
  description: 'Replace every character with the mask character',
  schema: {
    mask_char: {
      kind: 'string',
      default: '*',
      minLength: 1,
      maxLength: 1,
      description: 'Character used for masking',
    },
    fixed_length: {
      kind: 'number',
      min: 1,
      integer: true,
      description: 'Fixed output length regardless of the value length',
    },
  },
  apply(value, _context, strategy) {
    const maskChar = stringOption(strategy, 'mask_char', '*');
    const fixedLength = optionalNumberOption(strategy, 'fixed_length');
    if (fixedLength !== undefined) {
      return maskChar.repeat(fixedLength);
    }
    return maskFull(value, maskChar);
  },
};

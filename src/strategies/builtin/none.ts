import { StrategyDefinition, isTransformFn } from '../types';

export const noneStrategy: StrategyDefinition = {
  name: 'none',
  description: 'Leave the value visible, optionally passed through a transform',
  schema: {
    transform: {
      kind: 'function',
      description: 'Optional (value, context) => string hook applied to the value',
    },
  },
  apply(value, context) {
    const transform = context.options.transform;
    return isTransformFn(transform) ? transform(value, context) : value;
  },
};

import type { ForEachParams, Step } from '../model.js';
import { renderAll, renderString } from '../template.js';
import { ConfigError } from '../types.js';
import { withScope, type StepContext } from './context.js';

export type StepRunner = (steps: Step[], ctx: StepContext) => Promise<void>;

/**
 * Run the nested steps once per value, with the iterator's key bound to the
 * value in a child scope.
 */
export async function actionForEach(params: ForEachParams, ctx: StepContext, runSteps: StepRunner): Promise<void> {
  const { iterator } = params;
  const key = renderString(iterator.key.val, ctx.scope, iterator.key.pos);

  let values: string[];
  if (iterator.values && iterator.values.length > 0) {
    values = renderAll(iterator.values, ctx.scope);
  } else if (iterator.valuesFrom) {
    if (!ctx.evaluator) {
      throw new ConfigError('values_from needs an expression evaluator, but none was configured', {
        pos: iterator.valuesFrom.pos,
      });
    }
    values = await ctx.evaluator.evalStringList(iterator.valuesFrom, ctx.scope);
  } else {
    values = [];
  }

  for (const value of values) {
    await runSteps(params.steps, withScope(ctx, { [key]: value }));
  }
}

import type { GoTemplateParams } from '../model.js';
import { renderString } from '../template.js';
import { ConfigError, UnknownVarError, errorMessage } from '../types.js';
import { transformText, walkAndModify } from '../walk-modify.js';
import type { StepContext } from './context.js';

/** Render each selected file as a template, replacing its contents. */
export async function actionGoTemplate(params: GoTemplateParams, ctx: StepContext): Promise<void> {
  await walkAndModify(ctx, params.paths, (buf) =>
    transformText(buf, (text) => {
      try {
        return renderString(text, ctx.scope);
      } catch (err) {
        if (err instanceof UnknownVarError) throw err;
        throw new ConfigError(`failed executing file as template: ${errorMessage(err)}`, { cause: err });
      }
    }),
  );
}

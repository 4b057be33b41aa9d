import * as v from 'valibot';

// OpenAI-compatible chat completion body; only the fields we read
export const CompletionResponseSchema = v.object({
  choices: v.optional(
    v.array(
      v.object({
        message: v.optional(
          v.object({
            role: v.optional(v.string()),
            content: v.nullish(v.string()),
          }),
        ),
      }),
    ),
    [],
  ),
});

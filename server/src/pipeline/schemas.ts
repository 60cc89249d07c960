import { z } from "zod";

export const MAX_BULLETS = 5;
export const MAX_TITLE_CHARS = 300;
export const MAX_BULLET_CHARS = 1000;
export const MAX_ARTICLE_CHARS = 50_000;

export const SlideKindSchema = z.enum(["title", "body"]);
export type SlideKind = z.infer<typeof SlideKindSchema>;

export const SlideSchema = z.object({
  index: z.number().int().min(0),
  kind: SlideKindSchema,
  sourceText: z.string(),
  enhancedPrompt: z.string().optional(),
  imageUrl: z.string().optional()
});

export type Slide = z.infer<typeof SlideSchema>;

export type Story = {
  id: string;
  title: string;
  slides: Slide[];
  documentHtml?: string;
  publicUrl?: string;
  downloadUrl?: string;
  objectKey?: string;
};

export const RunSettingsSchema = z
  .object({
    synthesisConcurrency: z.number().int().min(1).max(8).optional(),
    autoAdvanceMs: z.number().int().min(0).max(60_000).optional()
  })
  .strict();

export type RunSettings = z.infer<typeof RunSettingsSchema>;

export const StoryRequestSchema = z.object({
  title: z.string().optional(),
  bullets: z.array(z.string()).optional(),
  article: z.string().optional()
});

export type StoryRequest = z.infer<typeof StoryRequestSchema>;

/** POST /api/stories body: blank bullets are dropped before the count rules apply. */
export const CreateStoryBodySchema = z
  .object({
    title: z.string().trim().max(MAX_TITLE_CHARS).optional(),
    bullets: z.array(z.string().max(MAX_BULLET_CHARS)).max(MAX_BULLETS).optional(),
    article: z.string().trim().max(MAX_ARTICLE_CHARS).optional(),
    settings: RunSettingsSchema.optional()
  })
  .strict()
  .transform((body) => {
    const bullets = (body.bullets ?? []).map((b) => b.trim()).filter((b) => b.length > 0);
    const request: StoryRequest = {};
    if (body.title) request.title = body.title;
    if (bullets.length > 0) request.bullets = bullets;
    if (body.article) request.article = body.article;
    return { request, settings: body.settings };
  })
  .superRefine(({ request }, ctx) => {
    if (!request.article && !request.title) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["title"], message: "title is required unless article text is provided" });
    }
    if (!request.article && !request.bullets) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["bullets"],
        message: "at least one bullet point is required unless article text is provided"
      });
    }
  });

/** Image synthesis response. Unknown fields are ignored; missing required ones fail. */
export const SynthesisResponseSchema = z.object({
  code: z.number().int(),
  message: z.string().nullish(),
  data: z
    .object({
      image_urls: z.array(z.string()).nullish()
    })
    .nullish()
});

export type SynthesisResponse = z.infer<typeof SynthesisResponseSchema>;

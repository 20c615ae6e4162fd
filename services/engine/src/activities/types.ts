import { z } from 'zod';

export const httpRequestInputSchema = z.object({
  url: z.string().min(1),
  method: z.string().min(1),
  headers: z.record(z.string()),
  body: z.string().optional()
});

export const httpResponseSchema = z.object({
  statusCode: z.number().int(),
  headers: z.record(z.string()),
  body: z.string()
});

export type HttpRequestInput = z.infer<typeof httpRequestInputSchema>;
export type HttpResponse = z.infer<typeof httpResponseSchema>;

export interface ActivityDefinitions {
  'http.request': { input: HttpRequestInput; output: HttpResponse };
}

export type ActivityName = keyof ActivityDefinitions;
export type ActivityInput<N extends ActivityName> = ActivityDefinitions[N]['input'];
export type ActivityOutput<N extends ActivityName> = ActivityDefinitions[N]['output'];

export type ActivityHandlers = {
  [N in ActivityName]: (input: ActivityInput<N>) => Promise<ActivityOutput<N>>;
};

export const ACTIVITY_NAMES = ['http.request'] as const satisfies readonly ActivityName[];

export const activityNameSchema = z.enum(ACTIVITY_NAMES);

export const activitySchemas: {
  [N in ActivityName]: {
    input: z.ZodType<ActivityInput<N>>;
    output: z.ZodType<ActivityOutput<N>>;
  };
} = {
  'http.request': { input: httpRequestInputSchema, output: httpResponseSchema }
};

export function invokeActivity<N extends ActivityName>(
  handlers: ActivityHandlers,
  name: N,
  input: unknown
): Promise<ActivityOutput<N>> {
  const parsed = activitySchemas[name].input.parse(input);
  return handlers[name](parsed);
}

import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

// YAML turns `port: 8080` into a number; templates are always strings.
const TemplateSchema = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const TemplateMapSchema = z.record(z.string(), TemplateSchema);

export const RequestSchema = z.object({
  method: z.string(),
  url: z.string(),
  headers: TemplateMapSchema.optional(),
  params: TemplateMapSchema.optional(),
  body: z
    .union([z.string(), JsonValueSchema])
    .transform((value) => (typeof value === 'string' ? value : JSON.stringify(value)))
    .optional(),
});

export const StatusExpectationSchema = z.union([z.number().int(), z.string()]);

export const ExpectationSchema = z.object({
  status: StatusExpectationSchema.optional(),
  schema: z.string().optional(),
  jsonpath: z.record(z.string(), JsonValueSchema).optional(),
  headers: TemplateMapSchema.optional(),
});

export const StepSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  request: RequestSchema,
  expect: ExpectationSchema.optional(),
});

export const DatasetSchema = z.object({
  file: z.string(),
  parallel: z.number().int().positive().optional(),
});

export const SuiteSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  env: z.string().optional(),
  vars: TemplateMapSchema.optional(),
  setup: z.array(StepSchema).optional(),
  tests: z.array(StepSchema),
  dataset: DatasetSchema.optional(),
  teardown: z.array(StepSchema).optional(),
});

export type Request = z.output<typeof RequestSchema>;
export type StatusExpectation = z.output<typeof StatusExpectationSchema>;
export type Expectation = z.output<typeof ExpectationSchema>;
export type Step = z.output<typeof StepSchema>;
export type Dataset = z.output<typeof DatasetSchema>;
export type Suite = z.output<typeof SuiteSchema>;

/** A suite together with the name it was loaded under (its file name). */
export interface NamedSuite {
  name: string;
  suite: Suite;
}

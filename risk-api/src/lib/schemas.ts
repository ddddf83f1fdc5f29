import { z } from 'zod';

const blankToUndefined = (value: unknown) =>
  value === '' || value === null ? undefined : value;

const FormInt = (min: number, max: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).optional());

const GradeField = FormInt(0, 20);

export const StudentInputSchema = z.object({
  G1: GradeField,
  G2: GradeField,
  G3: GradeField,
  absences: FormInt(0, 365),
  studytime: FormInt(1, 4),
  failures: FormInt(0, 4),
  famsup: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : blankToUndefined(value)),
    z.enum(['yes', 'no']).optional()
  ),
  Medu: FormInt(0, 4),
  Fedu: FormInt(0, 4),
  Dalc: FormInt(1, 5),
  Walc: FormInt(1, 5),
  goout: FormInt(1, 5),
});

export const StudentIndexParamSchema = z.object({
  index: z.coerce.number().int().min(0),
});

const FeatureVector = z.array(z.number().finite()).length(5);

export const ClassifierModelSchema = z.object({
  version: z.literal(1),
  algorithm: z.literal('logistic_regression'),
  features: z.tuple([
    z.literal('failures'),
    z.literal('absences'),
    z.literal('studytime'),
    z.literal('G1'),
    z.literal('G2'),
  ]),
  weights: FeatureVector,
  intercept: z.number().finite(),
  means: FeatureVector,
  scales: FeatureVector.refine((values) => values.every((v) => v > 0), 'scales_must_be_positive'),
  medians: z.object({
    failures: z.number().finite(),
    absences: z.number().finite(),
    studytime: z.number().finite(),
    G1: z.number().finite(),
    G2: z.number().finite(),
  }),
  trainedAt: z.string().datetime(),
  trainingRows: z.number().int().min(1),
  positiveRows: z.number().int().min(0),
  accuracy: z.number().min(0).max(1),
});

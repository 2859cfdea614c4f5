import { z } from 'zod';

export const credentialsSchema = z.object({
  username: z.string({ required_error: 'username is required' }),
  password: z.string({ required_error: 'password is required' }),
});

// Form posts send every field as a string. Only non-blank strings are
// coerced: a blank or null offset must not turn into 0.
function offsetSchema(name: string) {
  return z
    .union([z.number(), z.string().trim().min(1, `${name} is required`).pipe(z.coerce.number())], {
      errorMap: () => ({ message: `${name} must be a number` }),
    })
    .pipe(z.number().int(`${name} must be an integer`));
}

export const saveAnnotationSchema = z.object({
  doc_id: z.string().min(1, 'doc_id is required'),
  start: offsetSchema('start'),
  end: offsetSchema('end'),
  text: z.string(),
  label: z.string(),
  rank: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((rank) => (rank === undefined || rank === null || rank === '' ? null : String(rank))),
});

export const labelSchema = z.object({
  name: z.string().min(1, 'name is required'),
  color: z.string(),
});

export const annotationIndexSchema = z.coerce.number().int('index must be an integer');


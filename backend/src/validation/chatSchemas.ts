import { z, ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors/ChatErrors';

const payloadObject = <T extends z.ZodRawShape>(shape: T) =>
  z.object(shape, {
    required_error: 'Payload missing',
    invalid_type_error: 'Payload must be an object'
  });

const requiredString = (field: string) =>
  z.string({
    required_error: `${field} missing from payload`,
    invalid_type_error: `${field} must be a string`
  });

export const presencePayloadSchema = payloadObject({
  streamer: requiredString('Streamer')
});

export const loginPayloadSchema = payloadObject({
  username: requiredString('Username'),
  streamer: requiredString('Streamer'),
  color: z.string().optional().default(''),
  key: z.string().nullish()
});

export const messagePayloadSchema = payloadObject({
  message: requiredString('Message')
});

export const drawingPayloadSchema = payloadObject({
  src: requiredString('Image')
});

export type LoginPayload = z.infer<typeof loginPayloadSchema>;

export function parsePayload<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  raw: unknown
): Output {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue ? issue.message : 'Malformed payload');
  }
  return result.data;
}

import { z } from 'zod';
import { ConfigurationError, fail, ok, type Result } from './errors';
import { HOST_CONNECTIVITY, OS_TYPES, PORT_TYPES, type HostSpec } from '../types/host';

export const initiatorDetailSchema = z.object({
  portName: z.string().min(1, 'portName is required'),
  portType: z.enum(PORT_TYPES).optional(),
  chapSingleUsername: z.string().optional(),
  chapSinglePassword: z.string().optional(),
  chapMutualUsername: z.string().optional(),
  chapMutualPassword: z.string().optional(),
});

export const hostSpecSchema = z
  .object({
    name: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
    osType: z.enum(OS_TYPES).optional(),
    initiators: z.array(z.string().min(1)).optional(),
    detailedInitiators: z.array(initiatorDetailSchema).optional(),
    desiredExistence: z.enum(['present', 'absent']),
    initiatorIntent: z.enum(['present-in-host', 'absent-in-host']).optional(),
    newName: z.string().min(1).optional(),
    connectivity: z.enum(HOST_CONNECTIVITY).optional(),
  })
  .strict()
  .superRefine((spec, ctx) => {
    if (spec.name !== undefined && spec.id !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'parameters are mutually exclusive: name|id' });
    }
    if (spec.name === undefined && spec.id === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'one of the following is required: name, id' });
    }
    if (spec.initiators !== undefined && spec.detailedInitiators !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'parameters are mutually exclusive: initiators|detailedInitiators',
      });
    }
  });

export const hostSelectorSchema = z.union([
  z.object({ name: z.string().min(1) }).strict(),
  z.object({ id: z.string().min(1) }).strict(),
]);

export type HostSelector = z.infer<typeof hostSelectorSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate an untyped request payload into a HostSpec.
 */
export function parseHostSpec(input: unknown): Result<HostSpec, ConfigurationError> {
  const parsed = hostSpecSchema.safeParse(input);
  if (!parsed.success) {
    return fail(new ConfigurationError(`Invalid host request: ${formatIssues(parsed.error)}`));
  }
  return ok(parsed.data);
}

export function parseHostSelector(input: unknown): Result<HostSelector, ConfigurationError> {
  const parsed = hostSelectorSchema.safeParse(input);
  if (!parsed.success) {
    return fail(new ConfigurationError('Invalid host selector: exactly one of name or id is required'));
  }
  return ok(parsed.data);
}

import { z } from 'zod';
import type { ValidationIssue } from './errors.js';
import { MESSAGE_ROLES } from './entities/Conversation.js';

export const CreateConversationSchema = z.object({
  title: z.string({ required_error: 'Conversation title is required' }),
  // null is accepted and treated as absent
  createdBy: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
});

export const AddMessageSchema = z.object({
  role: z.enum(MESSAGE_ROLES, {
    errorMap: () => ({ message: "Role must be 'user' or 'assistant'" }),
  }),
  content: z.string({ required_error: 'Message content is required' }),
});

export const SendMessageSchema = z.object({
  content: z.string({ required_error: 'Message content is required' }),
});

export type CreateConversationInput = z.infer<typeof CreateConversationSchema>;
export type AddMessageInput = z.infer<typeof AddMessageSchema>;
export type SendMessageInput = z.infer<typeof SendMessageSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: ValidationIssue[] };

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((err) => ({
    path: err.path.join('.') || 'root',
    message: err.message,
  }));
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, issues: toValidationIssues(result.error) };
}

export function validateCreateConversation(
  input: unknown
): ValidationResult<CreateConversationInput> {
  return validate(CreateConversationSchema, input);
}

export function validateAddMessage(input: unknown): ValidationResult<AddMessageInput> {
  return validate(AddMessageSchema, input);
}

export function validateSendMessage(input: unknown): ValidationResult<SendMessageInput> {
  return validate(SendMessageSchema, input);
}

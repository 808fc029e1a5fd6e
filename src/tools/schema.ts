import {z} from 'zod'
import type {ToolParameters} from './types.js'

export type JsonSchemaProperty = {
  type: 'string' | 'number' | 'integer' | 'boolean'
  description?: string
}

export type ToolInputSchema = {
  type: 'object'
  properties: Record<string, JsonSchemaProperty>
  required: string[]
}

function unwrapOptional(field: z.ZodTypeAny): z.ZodTypeAny {
  if (field instanceof z.ZodOptional || field instanceof z.ZodNullable) return unwrapOptional(field.unwrap())
  if (field instanceof z.ZodDefault) return unwrapOptional(field.removeDefault())
  return field
}

function jsonType(key: string, field: z.ZodTypeAny): JsonSchemaProperty['type'] {
  if (field instanceof z.ZodString) return 'string'
  if (field instanceof z.ZodBoolean) return 'boolean'
  if (field instanceof z.ZodNumber) return field.isInt ? 'integer' : 'number'
  throw new Error(`Unsupported parameter type for '${key}': ${field.constructor.name}`)
}

export function requiredParameters(parameters: ToolParameters): string[] {
  return Object.entries<z.ZodTypeAny>(parameters.shape)
    .filter(([, field]) => !field.isOptional())
    .map(([key]) => key)
}

/** Derives the JSON-Schema parameter contract advertised to the completion service. */
export function toInputSchema(parameters: ToolParameters): ToolInputSchema {
  const properties: Record<string, JsonSchemaProperty> = {}
  for (const [key, field] of Object.entries<z.ZodTypeAny>(parameters.shape)) {
    const inner = unwrapOptional(field)
    const description = field.description ?? inner.description
    properties[key] = {
      type: jsonType(key, inner),
      ...(description ? {description} : {})
    }
  }

  return {
    type: 'object',
    properties,
    required: requiredParameters(parameters)
  }
}

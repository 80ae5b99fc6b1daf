/**
 * @parley/daemon — Local Tool definition
 *
 * Local tools declare their arguments as a zod object, the same way the
 * `ai` SDK's `tool()` helper does. The shape is also rendered into a
 * ParameterSchema so the prompt and the registry treat local and remote
 * tools alike.
 */

import { z } from 'zod';
import type { ParameterSchema, ParameterSpec } from '@parley/shared';

export interface LocalTool {
    readonly name: string;
    readonly description: string;
    readonly parameters: ParameterSchema;
    execute(args: Record<string, unknown>, signal: AbortSignal): Promise<unknown>;
}

export interface LocalToolDefinition<T extends z.ZodRawShape> {
    name: string;
    description: string;
    inputSchema: z.ZodObject<T>;
    execute: (args: z.infer<z.ZodObject<T>>, signal: AbortSignal) => unknown;
}

function describeField(field: z.ZodTypeAny): ParameterSpec {
    const description = field.description ?? '';
    let inner = field;
    let required = true;
    let defaultValue: { value: unknown } | undefined;

    for (;;) {
        if (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
            required = false;
            inner = inner.unwrap();
        } else if (inner instanceof z.ZodDefault) {
            required = false;
            defaultValue = { value: inner._def.defaultValue() };
            inner = inner.removeDefault();
        } else {
            break;
        }
    }

    const base = { description: description || (inner.description ?? ''), required };
    const withDefault = defaultValue ? { default: defaultValue.value } : {};

    if (inner instanceof z.ZodEnum) {
        const options: unknown[] = inner.options;
        return { type: 'string', ...base, enum: options.filter((o): o is string => typeof o === 'string'), ...withDefault };
    }
    if (inner instanceof z.ZodNumber) return { type: inner.isInt ? 'integer' : 'number', ...base, ...withDefault };
    if (inner instanceof z.ZodBoolean) return { type: 'boolean', ...base, ...withDefault };
    if (inner instanceof z.ZodArray) return { type: 'array', ...base, ...withDefault };
    if (inner instanceof z.ZodObject || inner instanceof z.ZodRecord) return { type: 'object', ...base, ...withDefault };
    return { type: 'string', ...base, ...withDefault };
}

/** Render a zod object's shape as a ParameterSchema */
export function toParameterSchema(schema: z.AnyZodObject): ParameterSchema {
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const out: Record<string, ParameterSpec> = {};
    for (const [name, field] of Object.entries(shape)) {
        out[name] = describeField(field);
    }
    return Object.freeze(out);
}

export function defineLocalTool<T extends z.ZodRawShape>(def: LocalToolDefinition<T>): LocalTool {
    return Object.freeze({
        name: def.name,
        description: def.description,
        parameters: toParameterSchema(def.inputSchema),
        async execute(args: Record<string, unknown>, signal: AbortSignal): Promise<unknown> {
            const parsed = def.inputSchema.parse(args);
            return await def.execute(parsed, signal);
        },
    });
}

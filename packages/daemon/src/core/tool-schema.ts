/**
 * @parley/daemon — Tool Parameter Schemas
 *
 * One parameter format (ParameterSchema) for local and remote tools:
 *  • normalizeParameterSchema() accepts what remote servers send
 *    (flat `{a: {type, description}}` maps or JSON-Schema objects).
 *  • buildArgumentValidator() turns a schema into a zod validator that
 *    coerces the loose values a model writes ("25" → 25, "Add" → "add").
 *  • decodeActionInput() maps the raw `Action Input:` text onto named
 *    arguments before validation.
 */

import { z } from 'zod';
import type { ParameterSchema, ParameterSpec } from '@parley/shared';

// ─── Normalization ────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSpec(raw: unknown, required: boolean | undefined): ParameterSpec {
    const def = isRecord(raw) ? raw : {};
    const type = typeof def['type'] === 'string' ? def['type'] : 'string';
    const description = typeof def['description'] === 'string' ? def['description'] : '';
    const enumValues = Array.isArray(def['enum'])
        ? def['enum'].filter((v): v is string => typeof v === 'string')
        : [];
    const hasDefault = 'default' in def;
    const explicitRequired = typeof def['required'] === 'boolean' ? def['required'] : undefined;

    return {
        type,
        description,
        required: required ?? explicitRequired ?? !hasDefault,
        ...(enumValues.length > 0 ? { enum: enumValues } : {}),
        ...(hasDefault ? { default: def['default'] } : {}),
    };
}

/** Normalize a remote tool's `parameters` field. Missing or malformed input yields an empty schema. */
export function normalizeParameterSchema(raw: unknown): ParameterSchema {
    if (!isRecord(raw)) return {};

    // JSON-Schema object form: { type: 'object', properties: {...}, required: [...] }
    if (raw['type'] === 'object' && isRecord(raw['properties'])) {
        const requiredList = Array.isArray(raw['required'])
            ? raw['required'].filter((v): v is string => typeof v === 'string')
            : [];
        const schema: Record<string, ParameterSpec> = {};
        for (const [name, def] of Object.entries(raw['properties'])) {
            schema[name] = toSpec(def, requiredList.includes(name));
        }
        return Object.freeze(schema);
    }

    // Flat form: { a: { type, description, default? } }
    const schema: Record<string, ParameterSpec> = {};
    for (const [name, def] of Object.entries(raw)) {
        schema[name] = toSpec(def, undefined);
    }
    return Object.freeze(schema);
}

// ─── Validation ───────────────────────────────────────────────────

function coerceNumber(value: unknown): unknown {
    if (typeof value === 'string' && value.trim() !== '') return Number(value.trim());
    return value;
}

function coerceBoolean(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    const lower = value.trim().toLowerCase();
    if (lower === 'true' || lower === 'yes') return true;
    if (lower === 'false' || lower === 'no') return false;
    return value;
}

function coerceString(value: unknown): unknown {
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return value;
}

function fieldValidator(spec: ParameterSpec): z.ZodTypeAny {
    switch (spec.type) {
        case 'number':
            return z.preprocess(coerceNumber, z.number().finite());
        case 'integer':
            return z.preprocess(coerceNumber, z.number().int().finite());
        case 'boolean':
            return z.preprocess(coerceBoolean, z.boolean());
        case 'array':
            return z.array(z.unknown());
        case 'object':
            return z.record(z.unknown());
        case 'string': {
            const [first, ...rest] = spec.enum ?? [];
            if (first === undefined) return z.preprocess(coerceString, z.string());
            const allowed = [first, ...rest];
            const canonical = (value: unknown): unknown => {
                const text = coerceString(value);
                if (typeof text !== 'string') return text;
                const needle = text.trim().toLowerCase();
                return allowed.find((v) => v.toLowerCase() === needle) ?? text;
            };
            return z.preprocess(canonical, z.enum([first, ...rest]));
        }
        default:
            return z.unknown();
    }
}

export type ArgumentValidator = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

/**
 * Build the validator for a tool's arguments. An empty schema accepts
 * any object unchanged (remote tools that publish no parameters);
 * otherwise unknown keys are dropped.
 */
export function buildArgumentValidator(schema: ParameterSchema): ArgumentValidator {
    const entries = Object.entries(schema);
    if (entries.length === 0) return z.record(z.unknown());

    const shape: Record<string, z.ZodTypeAny> = {};
    for (const [name, spec] of entries) {
        const field = fieldValidator(spec).describe(spec.description);
        shape[name] = spec.required ? field : field.optional();
    }
    return z.object(shape);
}

/** Flatten zod issues into one line the model can act on */
export function describeValidationError(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
        .join('; ');
}

// ─── Action Input Decoding ────────────────────────────────────────

export type DecodeResult =
    | { ok: true; args: Record<string, unknown> }
    | { ok: false; error: string };

const EMPTY_INPUT = /^(none|null|n\/a|no input|\{\s*\})$/i;
// One quoted span with no inner occurrence of the same quote
const QUOTED = /^(["'`])((?:(?!\1)[\s\S])*)\1$/;

function stripWrapping(text: string): string {
    let out = text.trim();
    const fence = out.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
    if (fence?.[1] !== undefined) out = fence[1].trim();
    const quoted = out.match(QUOTED);
    if (quoted?.[2] !== undefined) out = quoted[2].trim();
    if (out.startsWith('(') && out.endsWith(')')) out = out.slice(1, -1).trim();
    return out;
}

function unquote(value: string): string {
    const trimmed = value.trim();
    const quoted = trimmed.match(QUOTED);
    return quoted?.[2] ?? trimmed;
}

function parseScalar(text: string): unknown {
    try {
        const parsed: unknown = JSON.parse(text);
        if (typeof parsed !== 'object' || parsed === null) return parsed;
    } catch {
        /* plain text */
    }
    return unquote(text);
}

/**
 * Map the raw `Action Input:` text onto named arguments:
 *  1. empty / "None"             → {}
 *  2. JSON object                → as-is
 *  3. single-parameter tool      → the whole text binds to that parameter
 *  4. key=value pairs            → by name
 *  5. comma-separated values     → positionally, when the count matches
 *  6. one required parameter     → the whole text binds to it
 */
export function decodeActionInput(raw: string, schema: ParameterSchema): DecodeResult {
    const text = stripWrapping(raw);
    const names = Object.keys(schema);

    if (text === '' || EMPTY_INPUT.test(text)) return { ok: true, args: {} };

    if (text.startsWith('{')) {
        try {
            const parsed: unknown = JSON.parse(text);
            if (isRecord(parsed)) return { ok: true, args: parsed };
        } catch {
            return { ok: false, error: 'Action Input looks like JSON but could not be parsed; send a valid JSON object' };
        }
    }

    if (names.length === 0) return { ok: true, args: {} };

    const [onlyName] = names;
    if (names.length === 1 && onlyName !== undefined) {
        return { ok: true, args: { [onlyName]: parseScalar(text) } };
    }

    const pieces = text.split(/\s*[,\n]\s*/).filter((p) => p !== '');

    const pairs = pieces.map((p) => p.match(/^([A-Za-z_][\w-]*)\s*[=:]\s*(.*)$/s));
    if (pairs.length > 0 && pairs.every((m) => m !== null && m[1] !== undefined && names.includes(m[1]))) {
        const args: Record<string, unknown> = {};
        for (const m of pairs) {
            if (m?.[1] !== undefined) args[m[1]] = parseScalar(m[2] ?? '');
        }
        return { ok: true, args };
    }

    if (pieces.length === names.length) {
        const args: Record<string, unknown> = {};
        names.forEach((name, i) => {
            args[name] = parseScalar(pieces[i] ?? '');
        });
        return { ok: true, args };
    }

    const required = names.filter((n) => schema[n]?.required);
    const [onlyRequired] = required;
    if (required.length === 1 && onlyRequired !== undefined) {
        return { ok: true, args: { [onlyRequired]: parseScalar(text) } };
    }

    return {
        ok: false,
        error: `Could not map Action Input onto parameters (${names.join(', ')}); send a JSON object such as {"${names[0] ?? 'arg'}": ...}`,
    };
}

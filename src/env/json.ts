import type { z } from 'zod';
import type { EnvUnmarshaler } from './unmarshaler';
import { JsonValidationError, ValueParseError } from './errors';

/**
 * Unmarshaler for variables holding JSON, e.g. `VALID_IDS=["id1","id2"]`.
 * The parsed document is validated against a Zod schema before it is kept.
 *
 * @example
 * ```typescript
 * const Settings = t.record({ validIds: t.json(z.array(z.string())) });
 * const settings = load(Settings);
 * settings.validIds.value; // ['id1', 'id2']
 * ```
 */
export class JsonValue<T> implements EnvUnmarshaler {
    private current: T | undefined;

    constructor(private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>) { }

    /** The last value unmarshalled, or `undefined` if none was */
    get value(): T | undefined {
        return this.current;
    }

    unmarshalEnv(value: string): void {
        let document: unknown;
        try {
            document = JSON.parse(value);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ValueParseError(`Cannot parse "${value}" as JSON: ${reason}`, value, 'json');
        }

        const result = this.schema.safeParse(document);
        if (!result.success) {
            throw new JsonValidationError('JSON value failed validation', result.error);
        }

        this.current = result.data;
    }
}

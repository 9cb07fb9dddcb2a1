import type { TagDirectives } from '../types';
import { SKIP_TAG, SPACE_ESCAPE } from '../constants';

/**
 * Parse the text of a field's `env` tag
 *
 * The tag has the form `name,directive directive ...`. The first
 * comma-delimited segment is the explicit variable name (trimmed; empty means
 * the name is derived). The rest is a space-separated list of directives:
 *
 * - `required`: fail when the variable is absent and there is no default
 * - `default=<value>`: used when the variable is absent; `\s` stands for a space
 *
 * Keys are case-insensitive. Tokens that are neither `key=value` nor
 * `required` are ignored.
 *
 * @example
 * ```typescript
 * parseTag('AUTH');
 * // { explicitName: 'AUTH', required: false }
 * parseTag(',required default=John\\sDoe');
 * // { required: true, defaultValue: 'John Doe' }
 * ```
 *
 * @param tag - Raw tag text
 * @returns Parsed directives
 */
export function parseTag(tag: string): TagDirectives {
    const commaIndex = tag.indexOf(',');
    const namePart = commaIndex === -1 ? tag : tag.slice(0, commaIndex);
    const explicitName = namePart.trim();

    const directives: TagDirectives = { required: false };
    if (explicitName !== '') {
        directives.explicitName = explicitName;
    }
    if (commaIndex === -1) {
        return directives;
    }

    for (const token of tag.slice(commaIndex + 1).split(' ')) {
        const equalsIndex = token.indexOf('=');
        if (equalsIndex === -1) {
            if (token.toLowerCase() === 'required') {
                directives.required = true;
            }
            continue;
        }

        const key = token.slice(0, equalsIndex).toLowerCase();
        if (key === 'default') {
            directives.defaultValue = token.slice(equalsIndex + 1).replaceAll(SPACE_ESCAPE, ' ');
        }
    }

    return directives;
}

/**
 * Whether the directives exclude the field from unmarshalling.
 */
export function isSkipped(directives: TagDirectives): boolean {
    return directives.explicitName === SKIP_TAG;
}

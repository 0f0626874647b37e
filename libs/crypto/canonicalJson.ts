import _canonicalize from 'canonicalize';

// canonicalize ships a CommonJS default export; normalize the interop shape.
const canonicalize: (value: unknown) => string | undefined =
    typeof _canonicalize === 'function'
        ? _canonicalize
        : (_canonicalize as unknown as { default: (value: unknown) => string | undefined }).default;

/**
 * RFC 8785 canonical JSON. Key order of the input never changes the output,
 * so hashes and signatures survive a JSON round-trip through files or jsonb columns.
 */
export function canonicalJson(value: unknown): string {
    const json = canonicalize(value);
    if (json === undefined) {
        throw new Error('canonicalize returned undefined - input contains unsupported types');
    }
    return json;
}

/**
 * Quote a directive value when the builder would otherwise split or drop it:
 * empty strings and anything containing a space. Escaping follows JSON string
 * rules, which the builder's own quote handling reads back unchanged.
 */
export function mayQuote(value: string): string {
    if (value === '' || value.includes(' ')) {
        return JSON.stringify(value);
    }
    return value;
}

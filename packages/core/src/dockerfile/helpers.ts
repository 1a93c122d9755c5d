/**
 * Build a `run` list; reads better than an array literal in long stage definitions
 */
export function scripts(...commands: string[]): string[] {
    return commands;
}

/**
 * Build an `entrypoint`, `cmd` or `volume` list
 */
export function args(...tokens: string[]): string[] {
    return tokens;
}

/**
 * Reference a container environment variable inside CMD/ENTRYPOINT tokens
 */
export function containerEnvVar(name: string): string {
    return `$${name}`;
}

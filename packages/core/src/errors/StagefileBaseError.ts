/**
 * Common root for every error raised by stagefile packages.
 * Lets callers separate our errors from everything else with a single instanceof check.
 */
export abstract class StagefileBaseError extends Error {
    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    abstract toJSON(): Record<string, unknown>;
}

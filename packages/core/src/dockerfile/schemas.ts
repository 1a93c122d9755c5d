import { z } from 'zod';

/**
 * YAML scalars that end up as directive text. Numbers and booleans are
 * accepted for convenience (`PORT: 8080`) and stringified.
 */
const ScalarValueSchema = z
    .union([z.string(), z.number(), z.boolean()])
    .transform((value) => String(value));

const ValuesSchema = z.record(z.string(), ScalarValueSchema);

export const StageNameSchema = z
    .string()
    .regex(
        /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
        'Stage names start with a letter or digit and contain only letters, digits, ".", "_" and "-"'
    );

/**
 * One build stage. Key order here is the order directives are emitted in;
 * see DIRECTIVES in directives.ts for the keyword and formatting of each key.
 */
export const StageSchema = z
    .object({
        from: z.string().optional().describe('Base image reference (FROM)'),
        label: ValuesSchema.optional().describe('Image labels (LABEL k=v ...)'),
        workdir: z
            .string()
            .optional()
            .describe('Working directory (WORKDIR); required when other stages copy from this one'),
        env: ValuesSchema.optional().describe('Environment variables (ENV k=v ...)'),
        add: z
            .record(z.string(), z.string())
            .optional()
            .describe('Files to ADD, source -> destination; sources sharing a destination are grouped'),
        copy: z
            .record(z.string(), z.string())
            .optional()
            .describe(
                'Files to COPY, source -> destination; "<stage>:<path>" copies out of another stage'
            ),
        run: z
            .array(z.string())
            .optional()
            .describe('Shell commands, chained with && into one RUN'),
        expose: z
            .array(ScalarValueSchema)
            .optional()
            .describe('Exposed ports (EXPOSE)'),
        volume: z.array(z.string()).optional().describe('Volumes (VOLUME [...])'),
        entrypoint: z.array(z.string()).optional().describe('Entrypoint tokens (ENTRYPOINT [...])'),
        cmd: z.array(z.string()).optional().describe('Command tokens (CMD [...])'),
    })
    .strict()
    .describe('A single build stage');

export type Stage = z.output<typeof StageSchema>;
export type StageInput = z.input<typeof StageSchema>;

/**
 * Whole build description: named stages plus the inline, unnamed final stage
 */
export const DockerfileSchema = StageSchema.extend({
    image: z
        .string()
        .optional()
        .describe('Reference of the image this file builds; informational, never emitted'),
    stages: z
        .record(StageNameSchema, StageSchema)
        .optional()
        .describe('Named intermediate stages, referenced from copy sources as "<name>:<path>"'),
})
    .strict()
    .describe('Multi-stage build description');

export type Dockerfile = z.output<typeof DockerfileSchema>;
export type DockerfileInput = z.input<typeof DockerfileSchema>;

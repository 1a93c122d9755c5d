import type { Stage } from './schemas.js';

type KeysOfType<T, V> = {
    [K in keyof T]-?: NonNullable<T[K]> extends V ? K : never;
}[keyof T];

export type ScalarField = KeysOfType<Stage, string>;
export type SequenceField = KeysOfType<Stage, string[]>;
export type MappingField = KeysOfType<Stage, Record<string, string>>;

export type ScalarFlag = 'inline';
export type SequenceFlag = 'array' | 'script';
export type MappingFlag = 'multi' | 'join';

export type DirectiveKeyword =
    | 'FROM'
    | 'LABEL'
    | 'WORKDIR'
    | 'ENV'
    | 'ADD'
    | 'COPY'
    | 'RUN'
    | 'EXPOSE'
    | 'VOLUME'
    | 'ENTRYPOINT'
    | 'CMD';

/**
 * Metadata for one stage field: the directive it becomes and how its value is formatted.
 * A field carries at most one formatting flag.
 */
export type Directive =
    | { shape: 'scalar'; field: ScalarField; keyword: DirectiveKeyword; flag?: ScalarFlag }
    | { shape: 'sequence'; field: SequenceField; keyword: DirectiveKeyword; flag?: SequenceFlag }
    | { shape: 'mapping'; field: MappingField; keyword: DirectiveKeyword; flag?: MappingFlag };

export type DirectiveShape = Directive['shape'];

/**
 * Emission order of a stage. Tests pin this order; change it deliberately.
 */
export const DIRECTIVES: readonly Directive[] = [
    { shape: 'scalar', field: 'from', keyword: 'FROM' },
    { shape: 'mapping', field: 'label', keyword: 'LABEL', flag: 'multi' },
    { shape: 'scalar', field: 'workdir', keyword: 'WORKDIR' },
    { shape: 'mapping', field: 'env', keyword: 'ENV', flag: 'multi' },
    { shape: 'mapping', field: 'add', keyword: 'ADD', flag: 'join' },
    { shape: 'mapping', field: 'copy', keyword: 'COPY' },
    { shape: 'sequence', field: 'run', keyword: 'RUN', flag: 'script' },
    { shape: 'sequence', field: 'expose', keyword: 'EXPOSE' },
    { shape: 'sequence', field: 'volume', keyword: 'VOLUME', flag: 'array' },
    { shape: 'sequence', field: 'entrypoint', keyword: 'ENTRYPOINT', flag: 'array' },
    { shape: 'sequence', field: 'cmd', keyword: 'CMD', flag: 'array' },
];

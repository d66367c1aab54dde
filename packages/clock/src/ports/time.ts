/** Duration or epoch instant in milliseconds. */
export type Milliseconds = number

/** Duration in whole seconds. */
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = Milliseconds

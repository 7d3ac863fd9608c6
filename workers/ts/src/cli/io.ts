export type Writer = { write(chunk: string): unknown };

export type CliIO = { stdout: Writer; stderr: Writer };

export const processIO: CliIO = { stdout: process.stdout, stderr: process.stderr };

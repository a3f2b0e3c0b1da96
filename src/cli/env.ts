// Loaded before any module creates its logger: keep JSON logs out of the
// terminal output unless LOG_LEVEL asks for them.
process.env.LOG_LEVEL ??= 'warn';

export {};

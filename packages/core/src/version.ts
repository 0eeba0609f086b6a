export const VERSION = '0.1.0';

/** Instrumentation scope reported with every exported batch. */
export const SCOPE_NAME = '@spanline/core';

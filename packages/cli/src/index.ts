import { createProgram } from './program.js';

const program = createProgram();
await program.parseAsync();

export { program };

#!/usr/bin/env -S npx tsx

import { createProgram } from './program'

await createProgram().parseAsync(process.argv)

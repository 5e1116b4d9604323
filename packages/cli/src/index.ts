#!/usr/bin/env tsx

import 'dotenv/config'
import { createProgram } from './program.js'

await createProgram().parseAsync()

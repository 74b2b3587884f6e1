#!/usr/bin/env node
import { register } from 'tsx/esm/api'

// Workspace packages export their TypeScript sources
register()

const { createProgram } = await import('./index.js')

await createProgram().parseAsync(process.argv)

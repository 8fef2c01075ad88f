#!/usr/bin/env node
import { createProgram, reportError } from './program'

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv)
  } catch (error) {
    process.exitCode = reportError(error)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})

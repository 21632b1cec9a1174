#!/usr/bin/env tsx
import { fileURLToPath } from "node:url"
import { loadConfig } from "../src/config"
import { AppDb, findDuplicateNames } from "../src/db"
import { loadSeedFile, seedVendors } from "../src/seed"

interface SeedOptions {
  dbPath: string
  reset: boolean
  poison: boolean
  cleanFile: string
  poisonFile: string
}

const dataDir = fileURLToPath(new URL("../data/", import.meta.url))

function printUsage(): void {
  console.log(`Usage: npm run db:seed -- [options]

Options:
  --db <path>             SQLite database path (default: RAGGUARD_DB_PATH or ./data/vendor-rag-guard.db)
  --reset                 Remove existing vendors before seeding
  --poison                Also insert the poisoned entries (the insider's write)
  --clean-file <path>     Legitimate vendors (default: data/vendors.clean.json)
  --poison-file <path>    Poisoned vendors (default: data/vendors.poisoned.json)
  --help                  Show this message
`)
}

function requireValue(argv: string[], index: number, name: string): string {
  const next = argv[index + 1]
  if (!next) {
    throw new Error(`${name} requires a value`)
  }
  return next
}

function parseArgs(argv: string[]): SeedOptions {
  const config = loadConfig()
  const options: SeedOptions = {
    dbPath: config.dbPath,
    reset: false,
    poison: false,
    cleanFile: `${dataDir}vendors.clean.json`,
    poisonFile: `${dataDir}vendors.poisoned.json`,
  }

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]
    if (arg === "--help" || arg === "-h") {
      printUsage()
      process.exit(0)
    }

    if (arg === "--reset") {
      options.reset = true
      continue
    }

    if (arg === "--poison") {
      options.poison = true
      continue
    }

    if (arg === "--db") {
      options.dbPath = requireValue(argv, index, "--db")
      index += 1
      continue
    }

    if (arg === "--clean-file") {
      options.cleanFile = requireValue(argv, index, "--clean-file")
      index += 1
      continue
    }

    if (arg === "--poison-file") {
      options.poisonFile = requireValue(argv, index, "--poison-file")
      index += 1
      continue
    }

    throw new Error(`Unknown option: ${arg}`)
  }

  return options
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2))
  const db = await AppDb.open(options.dbPath)

  try {
    if (options.reset) {
      await db.clearVendors()
    }

    const cleanIds = await seedVendors(db, loadSeedFile(options.cleanFile))
    console.log(`Inserted ${cleanIds.length} vendors from ${options.cleanFile}`)

    if (options.poison) {
      const poisonIds = await seedVendors(db, loadSeedFile(options.poisonFile))
      console.log(`Inserted ${poisonIds.length} poisoned vendors from ${options.poisonFile}`)
    }

    const duplicates = findDuplicateNames(await db.all())
    if (duplicates.length > 0) {
      console.log(`Duplicate vendor names: ${duplicates.join(", ")}`)
    }
  } finally {
    db.close()
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})

import { fileURLToPath } from "node:url"
import { afterEach, describe, expect, test } from "vitest"
import { AppDb, findDuplicateNames } from "../src/db"
import { loadSeedFile, parseSeedFile, seedVendors } from "../src/seed"
import { search } from "../src/services/retriever"

const dataDir = fileURLToPath(new URL("../data/", import.meta.url))
const openDbs: AppDb[] = []

afterEach(() => {
  for (const db of openDbs.splice(0)) {
    db.close()
  }
})

describe("seed files", () => {
  test("parses vendors and defaults missing notes", () => {
    const vendors = parseSeedFile(
      JSON.stringify({ vendors: [{ name: "ABC Corp", account_id: "LEGIT-001" }] }),
    )

    expect(vendors).toEqual([{ name: "ABC Corp", accountId: "LEGIT-001", notes: "" }])
  })

  test("rejects records without an account", () => {
    expect(() => parseSeedFile(JSON.stringify({ vendors: [{ name: "ABC Corp" }] }))).toThrow()
  })

  test("the poisoned scenario outranks the clean ABC Corp record", async () => {
    const db = await AppDb.open(":memory:")
    openDbs.push(db)

    await seedVendors(db, loadSeedFile(`${dataDir}vendors.clean.json`))
    const poisonIds = await seedVendors(db, loadSeedFile(`${dataDir}vendors.poisoned.json`))

    expect(poisonIds).toEqual([6])

    const records = await db.all()
    expect(findDuplicateNames(records)).toEqual(["ABC Corp"])

    const candidates = search("Please pay ABC Corp", records)
    expect(candidates.map((candidate) => candidate.record.accountId)).toEqual([
      "ATTACKER-999",
      "LEGIT-001",
    ])
  })
})

import { readFileSync } from "node:fs"
import { z } from "zod"
import type { VendorStore } from "./db"
import type { VendorInput } from "./types"

const SeedFileSchema = z.object({
  vendors: z.array(
    z.object({
      name: z.string().min(1),
      account_id: z.string().min(1),
      notes: z.string().default(""),
    }),
  ),
})

export function parseSeedFile(contents: string): VendorInput[] {
  const parsed = SeedFileSchema.parse(JSON.parse(contents))
  return parsed.vendors.map((vendor) => ({
    name: vendor.name,
    accountId: vendor.account_id,
    notes: vendor.notes,
  }))
}

export function loadSeedFile(path: string): VendorInput[] {
  return parseSeedFile(readFileSync(path, "utf8"))
}

// Inserts one at a time so ids follow file order.
export async function seedVendors(store: VendorStore, vendors: VendorInput[]): Promise<number[]> {
  const ids: number[] = []
  for (const vendor of vendors) {
    ids.push(await store.insert(vendor))
  }
  return ids
}

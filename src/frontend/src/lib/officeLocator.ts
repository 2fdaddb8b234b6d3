import { z } from 'zod'
import officeDirectory from '../data/serviceOffices.json'
import type { ServiceOffice } from '../types'

export const MIN_POSTAL_CODE_LENGTH = 4

interface TrieNode<T> {
  children: Map<string, TrieNode<T>>
  value?: T
}

/** Character trie over prefixes; lookups return the value of the longest matching prefix. */
export class PrefixTrie<T> {
  private readonly root: TrieNode<T> = { children: new Map() }

  insert(prefix: string, value: T): void {
    if (prefix.length === 0) {
      throw new Error('Prefix must not be empty')
    }
    let node = this.root
    for (const char of prefix) {
      let next = node.children.get(char)
      if (!next) {
        next = { children: new Map() }
        node.children.set(char, next)
      }
      node = next
    }
    if (node.value !== undefined) {
      throw new Error(`Duplicate prefix "${prefix}"`)
    }
    node.value = value
  }

  longestMatch(key: string): T | undefined {
    let node = this.root
    let best: T | undefined
    for (const char of key) {
      const next = node.children.get(char)
      if (!next) break
      node = next
      if (node.value !== undefined) best = node.value
    }
    return best
  }
}

const ServiceOfficeSchema = z.object({
  name: z.string().min(1),
  email: z.string().email(),
  phone: z.string().min(1),
  address: z.string().min(1),
  workingHours: z.string().min(1),
})

const OfficeDirectorySchema = z.record(z.string().regex(/^[0-9A-Z]+$/), ServiceOfficeSchema)

export function normalizePostalCode(code: string): string {
  return code.replace(/\s+/g, '').toUpperCase()
}

export function buildOfficeIndex(raw: unknown): PrefixTrie<ServiceOffice> {
  const directory = OfficeDirectorySchema.parse(raw)
  const trie = new PrefixTrie<ServiceOffice>()
  for (const [prefix, office] of Object.entries(directory)) {
    trie.insert(prefix, Object.freeze({ ...office }))
  }
  return trie
}

const OFFICE_INDEX = buildOfficeIndex(officeDirectory)

/**
 * Resolves a postal code to the office registered under its longest matching
 * prefix. Returns undefined for empty input or when no prefix matches.
 */
export function findNearestOffice(
  code: string,
  index: PrefixTrie<ServiceOffice> = OFFICE_INDEX
): ServiceOffice | undefined {
  const normalized = normalizePostalCode(code)
  if (!normalized) return undefined
  return index.longestMatch(normalized)
}

export function formatContactInfo(office: ServiceOffice): string {
  return [
    office.name,
    `Address: ${office.address}`,
    `Phone: ${office.phone}`,
    `Email: ${office.email}`,
    `Working Hours: ${office.workingHours}`,
  ].join('\n')
}

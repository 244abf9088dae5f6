import type { LockStore } from "../store"

type Entry = { token: string; fence: number; expiresAt: number }

export class MemoryLockStore implements LockStore {
  readonly name = "memory"
  private readonly entries = new Map<string, Entry>()
  private readonly fences = new Map<string, number>()

  async acquire({
    resource,
    token,
    ttlMs,
    now,
  }: {
    resource: string
    token: string
    ttlMs: number
    now: number
  }): Promise<{ fence: number } | null> {
    const current = this.entries.get(resource)
    if (current && current.expiresAt > now) return null

    const fence = (this.fences.get(resource) ?? 0) + 1
    this.fences.set(resource, fence)
    this.entries.set(resource, { token, fence, expiresAt: now + ttlMs })
    return { fence }
  }

  async extend({
    resource,
    token,
    ttlMs,
    now,
  }: {
    resource: string
    token: string
    ttlMs: number
    now: number
  }): Promise<boolean> {
    const current = this.entries.get(resource)
    if (!current || current.token !== token || current.expiresAt <= now) return false
    current.expiresAt = now + ttlMs
    return true
  }

  async release({ resource, token }: { resource: string; token: string }): Promise<boolean> {
    const current = this.entries.get(resource)
    if (!current || current.token !== token) return false
    this.entries.delete(resource)
    return true
  }

  async validate({
    resource,
    token,
    fence,
    now,
  }: {
    resource: string
    token: string
    fence: number
    now: number
  }): Promise<boolean> {
    const current = this.entries.get(resource)
    return Boolean(
      current && current.token === token && current.fence === fence && current.expiresAt > now
    )
  }

  public holder(resource: string): string | null {
    return this.entries.get(resource)?.token ?? null
  }
}

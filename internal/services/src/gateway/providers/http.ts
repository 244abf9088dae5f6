import { type PeerHandle, peerHandleSchema } from "@peerline/db/validators"
import { Err, FetchError, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { z } from "zod"
import type { VpnControlPlane } from "../control-plane"

const listResponseSchema = z.object({
  peers: z.array(peerHandleSchema),
})

type FetchFn = typeof fetch

/**
 * JSON control API of the appliance: POST /peers, DELETE /peers/:id and
 * GET /peers?userId=
 */
export class HttpVpnControlPlane implements VpnControlPlane {
  readonly name: string
  readonly deduplicates: boolean
  private readonly baseUrl: string
  private readonly token: string
  private readonly logger: Logger
  private readonly fetch: FetchFn

  constructor({
    baseUrl,
    token,
    deduplicates = false,
    logger,
    fetch: fetchFn = globalThis.fetch,
  }: {
    baseUrl: string
    token: string
    deduplicates?: boolean
    logger: Logger
    fetch?: FetchFn
  }) {
    this.baseUrl = baseUrl.replace(/\/+$/, "")
    this.name = this.baseUrl
    this.token = token
    this.deduplicates = deduplicates
    this.logger = logger
    this.fetch = fetchFn
  }

  private async request({
    method,
    path,
    body,
    idempotencyKey,
    signal,
  }: {
    method: "GET" | "POST" | "DELETE"
    path: string
    body?: unknown
    idempotencyKey?: string
    signal?: AbortSignal
  }): Promise<Result<{ status: number; json: unknown }, FetchError>> {
    const url = `${this.baseUrl}${path}`
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/json",
    }
    if (body !== undefined) headers["Content-Type"] = "application/json"
    if (idempotencyKey) headers["Idempotency-Key"] = idempotencyKey

    let response: Response
    try {
      response = await this.fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      })
    } catch (error) {
      // network failure or abort, the call may still have reached the appliance
      return Err(
        new FetchError({
          message: error instanceof Error ? error.message : "request failed",
          retry: true,
          context: { url, method },
        })
      )
    }

    if (response.status === 404 && method === "DELETE") {
      return Ok({ status: 404, json: null })
    }

    if (!response.ok) {
      const retry = response.status >= 500 || response.status === 429 || response.status === 408
      this.logger.debug("control plane answered with an error", {
        url,
        method,
        status: response.status,
      })
      return Err(
        new FetchError({
          message: `control plane responded ${response.status}`,
          retry,
          context: { url, method, status: response.status },
        })
      )
    }

    if (response.status === 204) return Ok({ status: 204, json: null })

    try {
      return Ok({ status: response.status, json: await response.json() })
    } catch (error) {
      return Err(
        new FetchError({
          message: error instanceof Error ? error.message : "invalid response body",
          retry: false,
          context: { url, method, status: response.status },
        })
      )
    }
  }

  private parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    json: unknown,
    method: string,
    path: string
  ): Result<T, FetchError> {
    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      return Err(
        new FetchError({
          message: `unexpected response: ${parsed.error.message}`,
          retry: false,
          context: { url: `${this.baseUrl}${path}`, method },
        })
      )
    }
    return Ok(parsed.data)
  }

  async addPeer({
    userId,
    idempotencyKey,
    label,
    signal,
  }: {
    userId: string
    idempotencyKey: string
    label?: string | null
    signal?: AbortSignal
  }): Promise<Result<PeerHandle, FetchError>> {
    const result = await this.request({
      method: "POST",
      path: "/peers",
      body: { userId, idempotencyKey, label: label ?? null },
      idempotencyKey,
      signal,
    })
    if (result.err) return result

    return this.parse(peerHandleSchema, result.val.json, "POST", "/peers")
  }

  async removePeer({
    remoteId,
    signal,
  }: {
    remoteId: string
    signal?: AbortSignal
  }): Promise<Result<{ removed: boolean }, FetchError>> {
    const result = await this.request({
      method: "DELETE",
      path: `/peers/${encodeURIComponent(remoteId)}`,
      signal,
    })
    if (result.err) return result

    return Ok({ removed: result.val.status !== 404 })
  }

  async listPeers({
    userId,
    signal,
  }: {
    userId: string
    signal?: AbortSignal
  }): Promise<Result<PeerHandle[], FetchError>> {
    const path = `/peers?userId=${encodeURIComponent(userId)}`
    const result = await this.request({ method: "GET", path, signal })
    if (result.err) return result

    const parsed = this.parse(listResponseSchema, result.val.json, "GET", path)
    if (parsed.err) return parsed
    return Ok(parsed.val.peers)
  }
}

import { NoopLogger } from "@peerline/logging"
import { beforeEach, describe, expect, it, vi } from "vitest"
import { HttpVpnControlPlane } from "./http"

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  })

describe("HttpVpnControlPlane", () => {
  const fetchMock = vi.fn<typeof fetch>()
  let controlPlane: HttpVpnControlPlane

  beforeEach(() => {
    fetchMock.mockReset()
    controlPlane = new HttpVpnControlPlane({
      baseUrl: "http://appliance.test/api/",
      token: "test-secret",
      logger: new NoopLogger(),
      fetch: fetchMock,
    })
  })

  it("creates a peer with the idempotency key attached", async () => {
    fetchMock.mockResolvedValueOnce(
      json(
        {
          remoteId: "rp_9",
          userId: "usr_1",
          idempotencyKey: "k1",
          publicKey: "pk-9",
          config: "[Interface]",
        },
        201
      )
    )

    const { val } = await controlPlane.addPeer({ userId: "usr_1", idempotencyKey: "k1" })

    expect(val).toEqual({
      remoteId: "rp_9",
      userId: "usr_1",
      idempotencyKey: "k1",
      publicKey: "pk-9",
      config: "[Interface]",
      createdAt: null,
    })

    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe("http://appliance.test/api/peers")
    expect(init?.method).toBe("POST")
    expect(init?.headers).toMatchObject({
      Authorization: "Bearer test-secret",
      "Idempotency-Key": "k1",
    })
    expect(init?.body).toBe(JSON.stringify({ userId: "usr_1", idempotencyKey: "k1", label: null }))
  })

  it("marks server errors as retryable", async () => {
    fetchMock.mockResolvedValueOnce(json({ error: "busy" }, 503))

    const { err } = await controlPlane.addPeer({ userId: "usr_1", idempotencyKey: "k1" })

    expect(err?.retry).toBe(true)
    expect(err?.context?.status).toBe(503)
  })

  it("marks client errors as permanent", async () => {
    fetchMock.mockResolvedValueOnce(json({ error: "bad key" }, 400))

    const { err } = await controlPlane.addPeer({ userId: "usr_1", idempotencyKey: "k1" })

    expect(err?.retry).toBe(false)
  })

  it("marks network failures as retryable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"))

    const { err } = await controlPlane.listPeers({ userId: "usr_1" })

    expect(err?.retry).toBe(true)
    expect(err?.message).toBe("fetch failed")
  })

  it("refuses a malformed peer", async () => {
    fetchMock.mockResolvedValueOnce(json({ userId: "usr_1" }, 201))

    const { err } = await controlPlane.addPeer({ userId: "usr_1", idempotencyKey: "k1" })

    expect(err?.retry).toBe(false)
  })

  it("treats a missing peer on delete as already removed", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 404 }))

    const { val } = await controlPlane.removePeer({ remoteId: "rp 1" })

    expect(val).toEqual({ removed: false })
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://appliance.test/api/peers/rp%201")
  })

  it("reports a removed peer", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }))

    const { val } = await controlPlane.removePeer({ remoteId: "rp_1" })

    expect(val).toEqual({ removed: true })
  })

  it("lists the peers of a user", async () => {
    fetchMock.mockResolvedValueOnce(
      json({ peers: [{ remoteId: "rp_1", userId: "usr_1", idempotencyKey: "k1" }] })
    )

    const { val } = await controlPlane.listPeers({ userId: "usr_1" })

    expect(val?.map((p) => p.remoteId)).toEqual(["rp_1"])
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://appliance.test/api/peers?userId=usr_1")
  })
})

import type { Logger } from "@peerline/logging"
import { describe, expect, it, vi } from "vitest"
import { LoggerNotificationSink } from "./sinks"

describe("LoggerNotificationSink", () => {
  it("emits the event under its type", async () => {
    const logger: Logger = {
      debug: vi.fn(),
      emit: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      flush: vi.fn(async () => {}),
    }
    const sink = new LoggerNotificationSink({ logger })

    await sink.publish({ type: "peer.issued", userId: "usr_1", peerId: "peer_1", at: 5 })

    expect(logger.emit).toHaveBeenCalledWith("peer.issued", {
      type: "peer.issued",
      userId: "usr_1",
      peerId: "peer_1",
      at: 5,
    })
  })
})

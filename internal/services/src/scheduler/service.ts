import type { Subscription } from "@peerline/db/validators"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import type { LedgerError, SubscriptionLedger } from "../ledger"
import { type Outcome, type ProvisioningOrchestrator, createIntent } from "../orchestrator"

export type TickReport = {
  scanned: number
  expired: number
  // some peers could not be revoked, picked up again next tick
  grace: number
  rejected: number
  failed: number
}

/**
 * Turns due subscriptions into expire intents. The scan is lock-free, the
 * expire step checks the subscription again under the user's lock.
 */
export class ExpiryScheduler {
  private readonly ledger: SubscriptionLedger
  private readonly orchestrator: ProvisioningOrchestrator
  private readonly logger: Logger
  private readonly clock: () => number
  private readonly batchSize: number
  private readonly concurrency: number
  private timer: ReturnType<typeof setInterval> | null = null
  private running: Promise<unknown> | null = null

  constructor({
    ledger,
    orchestrator,
    logger,
    clock = Date.now,
    batchSize = 200,
    concurrency = 8,
  }: {
    ledger: SubscriptionLedger
    orchestrator: ProvisioningOrchestrator
    logger: Logger
    clock?: () => number
    batchSize?: number
    concurrency?: number
  }) {
    this.ledger = ledger
    this.orchestrator = orchestrator
    this.logger = logger
    this.clock = clock
    this.batchSize = batchSize
    this.concurrency = Math.max(1, concurrency)
  }

  // one key per expiry date, so a renewed subscription expires again later
  public static expireKey(subscription: Pick<Subscription, "userId" | "activeUntil">): string {
    return `expire:${subscription.userId}:${subscription.activeUntil}`
  }

  private count(report: TickReport, outcome: Outcome): void {
    switch (outcome.status) {
      case "committed":
        report.expired++
        return
      case "rejected":
        report.rejected++
        return
      case "failed":
        if (outcome.unresolvedPeers.length > 0) report.grace++
        else report.failed++
    }
  }

  public async tick(now = this.clock()): Promise<Result<TickReport, LedgerError>> {
    const due = await this.ledger.listDue({ now, limit: this.batchSize })
    if (due.err) {
      this.logger.error("expiry scan failed", { error: due.err.message })
      return Err(due.err)
    }

    const report: TickReport = {
      scanned: due.val.length,
      expired: 0,
      grace: 0,
      rejected: 0,
      failed: 0,
    }

    for (let i = 0; i < due.val.length; i += this.concurrency) {
      const batch = due.val.slice(i, i + this.concurrency)
      const outcomes = await Promise.all(
        batch.map((subscription) =>
          this.orchestrator.submitIntent(
            createIntent(
              {
                kind: "expire",
                userId: subscription.userId,
                idempotencyKey: ExpiryScheduler.expireKey(subscription),
              },
              now
            )
          )
        )
      )

      for (const outcome of outcomes) this.count(report, outcome)
    }

    if (report.scanned > 0) this.logger.info("expiry tick finished", { ...report })
    return Ok(report)
  }

  // skips a tick while the previous one is still running
  private runTick(): void {
    if (this.running) return

    this.running = this.tick()
      .catch((error: unknown) => {
        this.logger.error("expiry tick crashed", {
          error: error instanceof Error ? error.message : "unknown",
        })
      })
      .finally(() => {
        this.running = null
      })
  }

  public start(intervalMs: number): void {
    if (this.timer) return

    this.logger.info("expiry scheduler started", { intervalMs })
    this.runTick()
    this.timer = setInterval(() => this.runTick(), intervalMs)
  }

  /**
   * Stops the interval and waits for a tick in flight
   */
  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
      this.logger.info("expiry scheduler stopped")
    }
    await this.running
  }
}

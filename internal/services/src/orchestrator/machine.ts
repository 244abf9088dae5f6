import { Err, Ok, type Result } from "@peerline/error"
import { assign, createActor, fromPromise, setup, waitFor } from "xstate"
import { LedgerError } from "../ledger"
import { StorageError } from "../errors"
import { OrchestratorError } from "./errors"
import { isCommitted, isMissingSubscription, isRejected } from "./guards"
import {
  activateSubscription,
  creditSubscription,
  expireSubscription,
  issuePeer,
  loadSubscription,
  renewSubscription,
  revokePeer,
} from "./invokes"
import {
  type IntentMachineContext,
  type IntentMachineInput,
  type IntentMachineTag,
  type StepResult,
  failed,
  rejected,
} from "./types"

// anything a step throws ends the intent as a failure, never as a commit
function failureFrom(error: unknown, context: IntentMachineContext): StepResult {
  const { logger } = context.deps
  const fields = {
    userId: context.intent.userId,
    intentId: context.intent.intentId,
    error: error instanceof Error ? error.message : String(error),
  }

  if (error instanceof StorageError || error instanceof LedgerError) {
    logger.error("intent step hit a storage failure", fields)
  } else {
    logger.error("intent step crashed", fields)
  }

  return failed("StorageUnavailable")
}

/**
 * Intent lifecycle
 *
 * States:
 * - loading: reads the subscription under the lock
 * - routing: picks the step for the intent kind
 * - issuing, renewing, revoking, expiring, activating, crediting: one step each
 * - settling: maps the step result onto a terminal state
 * - committed, rejected, failed: terminal
 */
export const intentMachine = setup({
  types: {} as {
    context: IntentMachineContext
    input: IntentMachineInput
    tags: IntentMachineTag
    output: StepResult | null
  },
  actors: {
    loadSubscription: fromPromise(({ input }: { input: IntentMachineContext }) =>
      loadSubscription(input)
    ),
    issuePeer: fromPromise(({ input }: { input: IntentMachineContext }) => issuePeer(input)),
    renewSubscription: fromPromise(({ input }: { input: IntentMachineContext }) =>
      renewSubscription(input)
    ),
    revokePeer: fromPromise(({ input }: { input: IntentMachineContext }) => revokePeer(input)),
    expireSubscription: fromPromise(({ input }: { input: IntentMachineContext }) =>
      expireSubscription(input)
    ),
    activateSubscription: fromPromise(({ input }: { input: IntentMachineContext }) =>
      activateSubscription(input)
    ),
    creditSubscription: fromPromise(({ input }: { input: IntentMachineContext }) =>
      creditSubscription(input)
    ),
  },
  guards: {
    isMissingSubscription,
    isCommitted,
    isRejected,
  },
  actions: {
    logTransition: ({ context }, params: { to: string }) => {
      context.deps.logger.debug("intent transition", {
        userId: context.intent.userId,
        intentId: context.intent.intentId,
        kind: context.intent.kind,
        to: params.to,
      })
    },
  },
}).createMachine({
  id: "intentMachine",
  initial: "loading",
  context: ({ input }) => ({ ...input, subscription: null, result: null }),
  output: ({ context }) => context.result,
  states: {
    loading: {
      tags: ["working"],
      invoke: {
        id: "loadSubscription",
        src: "loadSubscription",
        input: ({ context }) => context,
        onDone: {
          target: "routing",
          actions: assign({ subscription: ({ event }) => event.output }),
        },
        onError: {
          target: "settling",
          actions: assign({ result: ({ event, context }) => failureFrom(event.error, context) }),
        },
      },
    },
    routing: {
      tags: ["working"],
      always: [
        {
          guard: "isMissingSubscription",
          target: "settling",
          actions: assign({ result: () => rejected("NoSubscription") }),
        },
        {
          guard: ({ context }) => context.intent.kind === "issue",
          target: "issuing",
          actions: { type: "logTransition", params: { to: "issuing" } },
        },
        {
          guard: ({ context }) => context.intent.kind === "renew",
          target: "renewing",
          actions: { type: "logTransition", params: { to: "renewing" } },
        },
        {
          guard: ({ context }) => context.intent.kind === "revoke",
          target: "revoking",
          actions: { type: "logTransition", params: { to: "revoking" } },
        },
        {
          guard: ({ context }) => context.intent.kind === "expire",
          target: "expiring",
          actions: { type: "logTransition", params: { to: "expiring" } },
        },
        {
          guard: ({ context }) => context.intent.kind === "activate",
          target: "activating",
          actions: { type: "logTransition", params: { to: "activating" } },
        },
        {
          guard: ({ context }) => context.intent.kind === "credit",
          target: "crediting",
          actions: { type: "logTransition", params: { to: "crediting" } },
        },
      ],
    },
    issuing: {
      tags: ["working"],
      invoke: {
        id: "issuePeer",
        src: "issuePeer",
        input: ({ context }) => context,
        onDone: { target: "settling", actions: assign({ result: ({ event }) => event.output }) },
        onError: {
          target: "settling",
          actions: assign({ result: ({ event, context }) => failureFrom(event.error, context) }),
        },
      },
    },
    renewing: {
      tags: ["working"],
      invoke: {
        id: "renewSubscription",
        src: "renewSubscription",
        input: ({ context }) => context,
        onDone: { target: "settling", actions: assign({ result: ({ event }) => event.output }) },
        onError: {
          target: "settling",
          actions: assign({ result: ({ event, context }) => failureFrom(event.error, context) }),
        },
      },
    },
    revoking: {
      tags: ["working"],
      invoke: {
        id: "revokePeer",
        src: "revokePeer",
        input: ({ context }) => context,
        onDone: { target: "settling", actions: assign({ result: ({ event }) => event.output }) },
        onError: {
          target: "settling",
          actions: assign({ result: ({ event, context }) => failureFrom(event.error, context) }),
        },
      },
    },
    expiring: {
      tags: ["working"],
      invoke: {
        id: "expireSubscription",
        src: "expireSubscription",
        input: ({ context }) => context,
        onDone: { target: "settling", actions: assign({ result: ({ event }) => event.output }) },
        onError: {
          target: "settling",
          actions: assign({ result: ({ event, context }) => failureFrom(event.error, context) }),
        },
      },
    },
    activating: {
      tags: ["working"],
      invoke: {
        id: "activateSubscription",
        src: "activateSubscription",
        input: ({ context }) => context,
        onDone: { target: "settling", actions: assign({ result: ({ event }) => event.output }) },
        onError: {
          target: "settling",
          actions: assign({ result: ({ event, context }) => failureFrom(event.error, context) }),
        },
      },
    },
    crediting: {
      tags: ["working"],
      invoke: {
        id: "creditSubscription",
        src: "creditSubscription",
        input: ({ context }) => context,
        onDone: { target: "settling", actions: assign({ result: ({ event }) => event.output }) },
        onError: {
          target: "settling",
          actions: assign({ result: ({ event, context }) => failureFrom(event.error, context) }),
        },
      },
    },
    settling: {
      always: [
        { guard: "isCommitted", target: "committed" },
        { guard: "isRejected", target: "rejected" },
        { target: "failed" },
      ],
    },
    committed: { tags: ["final"], type: "final" },
    rejected: { tags: ["final"], type: "final" },
    failed: { tags: ["final"], type: "final" },
  },
})

/**
 * Runs one intent to a terminal state. A passed deadline only aborts the
 * signal: remote calls stop, but a step already writing is awaited, so
 * nothing lands after the lock is released.
 */
export async function runIntentMachine(
  input: IntentMachineInput
): Promise<Result<StepResult, OrchestratorError>> {
  const actor = createActor(intentMachine, { input })

  try {
    actor.start()
    const snapshot = await waitFor(actor, (s) => s.status === "done")

    const result = snapshot.context.result
    if (!result) {
      return Err(new OrchestratorError({ code: "MACHINE", message: "intent ended without a result" }))
    }
    return Ok(result)
  } catch (error) {
    return Err(
      new OrchestratorError({
        code: "MACHINE",
        message: error instanceof Error ? error.message : "intent machine failed",
        context: { intentId: input.intent.intentId, userId: input.intent.userId },
      })
    )
  } finally {
    actor.stop()
  }
}

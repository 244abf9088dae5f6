export {
  DEFAULT_MAX_PEERS_PER_USER,
  PLAN_TIERS,
  SECONDS_PER_DAY,
  planPeerLimit,
  type PlanTier,
} from "./constants"

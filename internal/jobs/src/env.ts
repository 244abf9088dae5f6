export { env } from "@peerline/config/env"

export type { VpnControlPlane } from "./control-plane"
export { ProvisioningGateway } from "./service"
export { ProvisioningError, type ProvisioningErrorCode } from "./errors"
export { RetryPolicy, type RetryPolicyOptions } from "./retry"
export { HttpVpnControlPlane } from "./providers/http"
export {
  MemoryVpnControlPlane,
  type ControlPlaneCall,
  type ControlPlaneFault,
  type ControlPlaneOperation,
} from "./providers/memory"

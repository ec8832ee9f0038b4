/**
 * @vmident/identity
 *
 * Resolves the Kube-OVN network identity of a KubeVirt VM.
 *
 * @example
 * ```typescript
 * import { NetworkIdentityResolver } from "@vmident/identity";
 *
 * const resolver = new NetworkIdentityResolver(fetcher, logger);
 * const result = await resolver.resolveAnnotations(vm);
 * if (result.isOk()) {
 *   // { "ovn.kubernetes.io/mac_address": "...", "ovn.kubernetes.io/ip_address": "..." }
 *   console.log(result.unwrap());
 * }
 * ```
 */

export {
  resolveAttachment,
  resolveAttachments,
  type ResolvedAttachment,
} from "./enumerator.js";

export { NetworkIdentityResolver } from "./resolver.js";

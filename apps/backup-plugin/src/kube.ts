import { CustomObjectsApi, KubeConfig } from "@kubernetes/client-node";
import { Result } from "better-result";
import { StoreUnavailableError } from "@vmident/errors";
import type { ClusterCustomObjectReader } from "@vmident/kubeovn";
import type { NamespacedCustomObjectReader } from "@vmident/kubevirt";

/**
 * What the plugin needs from `CustomObjectsApi`
 */
export type CustomObjectsClient = ClusterCustomObjectReader & NamespacedCustomObjectReader;

export type CustomObjectsApiFactory = () => Result<
  CustomObjectsClient,
  StoreUnavailableError
>;

/**
 * Create the custom objects client from a kubeconfig file, or from the
 * client's default lookup (KUBECONFIG, in-cluster service account,
 * ~/.kube/config)
 */
export function createCustomObjectsApi(
  kubeconfigPath?: string
): Result<CustomObjectsApi, StoreUnavailableError> {
  return Result.try({
    try: () => {
      const kubeConfig = new KubeConfig();
      if (kubeconfigPath) {
        kubeConfig.loadFromFile(kubeconfigPath);
      } else {
        kubeConfig.loadFromDefault();
      }
      return kubeConfig.makeApiClient(CustomObjectsApi);
    },
    catch: (error) =>
      new StoreUnavailableError({
        message: `failed to load kubeconfig: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      }),
  });
}

/**
 * Build the client on first use and share it afterwards.
 * A failed attempt is not cached.
 */
export function lazyCustomObjectsApi(
  kubeconfigPath?: string,
  create: (path?: string) => Result<CustomObjectsClient, StoreUnavailableError> = createCustomObjectsApi
): CustomObjectsApiFactory {
  let api: CustomObjectsClient | null = null;

  return () => {
    if (api) {
      return Result.ok(api);
    }
    const created = create(kubeconfigPath);
    if (created.isOk()) {
      api = created.unwrap();
    }
    return created;
  };
}

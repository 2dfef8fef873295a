import { PatchConflictError } from '../errors';
import { buildDigestSyncPatch } from './patch';
import { AppsApi, KubeWorkloadClient } from './workloads';

const deployment = { metadata: { name: 'web', namespace: 'shop' } };

function createApps(): jest.Mocked<AppsApi> {
  const list = () => jest.fn().mockResolvedValue({ response: {}, body: { items: [deployment] } });
  return {
    listDeploymentForAllNamespaces: list(),
    listNamespacedDeployment: list(),
    patchNamespacedDeployment: jest.fn().mockResolvedValue({ response: {}, body: {} }),
    listStatefulSetForAllNamespaces: list(),
    listNamespacedStatefulSet: list(),
    patchNamespacedStatefulSet: jest.fn().mockResolvedValue({ response: {}, body: {} }),
    listDaemonSetForAllNamespaces: list(),
    listNamespacedDaemonSet: list(),
    patchNamespacedDaemonSet: jest.fn().mockResolvedValue({ response: {}, body: {} }),
  };
}

describe('KubeWorkloadClient', () => {
  let apps: jest.Mocked<AppsApi>;
  let client: KubeWorkloadClient;

  beforeEach(() => {
    apps = createApps();
    client = new KubeWorkloadClient(apps);
  });

  describe('list', () => {
    test('should list across all namespaces without a namespace', async () => {
      const items = await client.list('Deployment');

      expect(items).toEqual([deployment]);
      expect(apps.listDeploymentForAllNamespaces).toHaveBeenCalledTimes(1);
      expect(apps.listNamespacedDeployment).not.toHaveBeenCalled();
    });

    test('should list one namespace when given', async () => {
      await client.list('StatefulSet', 'shop');

      expect(apps.listNamespacedStatefulSet).toHaveBeenCalledWith('shop');
      expect(apps.listStatefulSetForAllNamespaces).not.toHaveBeenCalled();
    });

    test('should use the DaemonSet endpoints', async () => {
      await client.list('DaemonSet');

      expect(apps.listDaemonSetForAllNamespaces).toHaveBeenCalledTimes(1);
    });
  });

  describe('patch', () => {
    const body = buildDigestSyncPatch('app:sha256:aaaa', '3');

    test('should send a strategic merge patch', async () => {
      await client.patch('Deployment', 'shop', 'web', body);

      expect(apps.patchNamespacedDeployment).toHaveBeenCalledWith(
        'web',
        'shop',
        body,
        undefined,
        undefined,
        'image-updater',
        undefined,
        undefined,
        { headers: { 'Content-Type': 'application/strategic-merge-patch+json' } }
      );
    });

    test('should route by kind', async () => {
      await client.patch('StatefulSet', 'data', 'db', body);
      await client.patch('DaemonSet', 'kube-system', 'agent', body);

      expect(apps.patchNamespacedStatefulSet.mock.calls[0][0]).toBe('db');
      expect(apps.patchNamespacedDaemonSet.mock.calls[0][0]).toBe('agent');
      expect(apps.patchNamespacedDeployment).not.toHaveBeenCalled();
    });

    test('should map 409 to PatchConflictError', async () => {
      apps.patchNamespacedDeployment.mockRejectedValue(Object.assign(new Error('HTTP request failed'), { statusCode: 409 }));

      const error = await client.patch('Deployment', 'shop', 'web', body).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PatchConflictError);
      expect(error).toMatchObject({ workload: 'Deployment/shop/web', code: 'PATCH_CONFLICT' });
    });

    test('should rethrow other API errors', async () => {
      const failure = Object.assign(new Error('HTTP request failed'), { statusCode: 403 });
      apps.patchNamespacedDaemonSet.mockRejectedValue(failure);

      await expect(client.patch('DaemonSet', 'ns', 'agent', body)).rejects.toBe(failure);
    });
  });
});

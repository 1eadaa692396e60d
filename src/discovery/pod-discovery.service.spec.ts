import { ConfigService } from '@config/config.service';
import { PodDiscoveryService } from '@discovery/pod-discovery.service';
import { FakeHostResolver, podHost } from '../../test/fakes';

function hostsUpTo(count: number): string[] {
  return Array.from({ length: count }, (_, ordinal) => podHost(ordinal));
}

describe('PodDiscoveryService', () => {
  const config = new ConfigService({ BITCOIN_SERVICE_NAME: 'bitcoin-stack', BITCOIN_NAMESPACE: 'bitcoin' });

  it.each([0, 1, 2, 3, 5, 9])('returns exactly %i contiguous pods in ascending order', async count => {
    const resolver = new FakeHostResolver(hostsUpTo(count));
    const service = new PodDiscoveryService(config, resolver);

    const pods = await service.discover();

    expect(pods.map(pod => pod.host)).toEqual(hostsUpTo(count));
    expect(pods.map(pod => pod.ordinal)).toEqual(Array.from({ length: count }, (_, i) => i));
    // the first unresolvable ordinal is the last one probed
    expect(resolver.probed).toEqual(hostsUpTo(count + 1));
  });

  it('stops at ten pods without probing ordinal 10', async () => {
    const resolver = new FakeHostResolver(hostsUpTo(12));
    const service = new PodDiscoveryService(config, resolver);

    const pods = await service.discover();

    expect(pods).toHaveLength(10);
    expect(pods[9].host).toBe(podHost(9));
    expect(resolver.probed).toHaveLength(10);
    expect(resolver.probed).not.toContain(podHost(10));
  });

  it('stops at the first gap in ordinals', async () => {
    const resolver = new FakeHostResolver([podHost(0), podHost(1), podHost(3), podHost(4)]);
    const service = new PodDiscoveryService(config, resolver);

    const pods = await service.discover();

    expect(pods.map(pod => pod.pod)).toEqual(['bitcoin-stack-0', 'bitcoin-stack-1']);
    expect(resolver.probed).not.toContain(podHost(3));
  });

  it('builds hostnames from the configured service and namespace', async () => {
    const custom = new ConfigService({ BITCOIN_SERVICE_NAME: 'btc', BITCOIN_NAMESPACE: 'chain' });
    const resolver = new FakeHostResolver(['btc-0.btc.chain.svc.cluster.local']);
    const service = new PodDiscoveryService(custom, resolver);

    const pods = await service.discover();

    expect(pods).toEqual([{ ordinal: 0, host: 'btc-0.btc.chain.svc.cluster.local', pod: 'btc-0' }]);
  });

  it('offers ordinal 0 as the fallback endpoint', () => {
    const service = new PodDiscoveryService(config, new FakeHostResolver([]));

    expect(service.fallbackEndpoint()).toEqual({
      ordinal: 0,
      host: 'bitcoin-stack-0.bitcoin-stack.bitcoin.svc.cluster.local',
      pod: 'bitcoin-stack-0',
    });
  });
});

import { AppModule } from '@/app.module';
import { ScrapeExceptionFilter } from '@common/filters/scrape-exception.filter';
import { ConfigService } from '@config/config.service';
import { HostResolver } from '@discovery/host-resolver';
import { PodDiscoveryService } from '@discovery/pod-discovery.service';
import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { BitcoinRpcClient } from '@rpc/bitcoin-rpc.client';
import { Server } from 'node:http';
import { FakeHostResolver, peers, podHost, respondFrom } from './fakes';

describe('Exporter HTTP surface', () => {
  let app: INestApplication;
  let baseUrl: string;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(ConfigService)
      .useValue(new ConfigService({ BITCOIN_SERVICE_NAME: 'bitcoin-stack', BITCOIN_NAMESPACE: 'bitcoin' }))
      .overrideProvider(HostResolver)
      .useValue(new FakeHostResolver([podHost(0), podHost(1), podHost(2)]))
      .compile();

    jest.spyOn(moduleRef.get(BitcoinRpcClient), 'call').mockImplementation(
      respondFrom({
        // pod 0 is fully synced
        [podHost(0)]: {
          getblockchaininfo: { blocks: 800000, difficulty: 55e12, verificationprogress: 1.0 },
          getpeerinfo: peers(8),
          getnetworkinfo: { connections: 10 },
        },
        // pod 1 times out on every call; pod 2 fails getpeerinfo
        [podHost(2)]: {
          getblockchaininfo: { blocks: 799999, difficulty: 55e12, verificationprogress: 1.0 },
          getnetworkinfo: { connections: 5 },
        },
      }),
    );

    app = moduleRef.createNestApplication({ logger: false });
    app.useGlobalFilters(new ScrapeExceptionFilter());
    await app.listen(0, '127.0.0.1');

    const server: Server = app.getHttpServer();
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Exporter is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await app.close();
  });

  it('GET /health answers OK', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toMatch(/^text\/plain/);
    expect(await response.text()).toBe('OK');
  });

  it('GET /metrics renders every discovered pod', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    const lines = (await response.text()).split('\n');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toMatch(/^text\/plain/);
    expect(lines.filter(line => line.startsWith('bitcoin_pod_healthy{'))).toHaveLength(3);
    expect(lines).toContain('bitcoin_pod_healthy{pod="bitcoin-stack-0"} 1');
    expect(lines).toContain('bitcoin_pod_healthy{pod="bitcoin-stack-1"} 0');
    expect(lines).toContain('bitcoin_pod_healthy{pod="bitcoin-stack-2"} 1');
    expect(lines).toContain('bitcoin_blocks{pod="bitcoin-stack-0"} 800000');
    expect(lines).toContain('bitcoin_blocks{pod="bitcoin-stack-1"} 0');
    expect(lines).toContain('bitcoin_peers{pod="bitcoin-stack-1"} 0');
    expect(lines).toContain('bitcoin_connections{pod="bitcoin-stack-1"} 0');
    expect(lines).toContain('bitcoin_blocks{pod="bitcoin-stack-2"} 799999');
    expect(lines).toContain('bitcoin_peers{pod="bitcoin-stack-2"} 0');
    expect(lines).toContain('bitcoin_connections{pod="bitcoin-stack-2"} 5');
  });

  it('answers 404 with an empty body for unknown paths', async () => {
    const response = await fetch(`${baseUrl}/nonexistent`);

    expect(response.status).toBe(404);
    expect(await response.text()).toBe('');
  });

  it.each(['/metrics/', '/metrics?x=1', '/health/'])('answers 404 for %s, which is not an exact route', async path => {
    const response = await fetch(`${baseUrl}${path}`);

    expect(response.status).toBe(404);
    expect(await response.text()).toBe('');
  });

  it('answers 500 with the error message when the scrape fails', async () => {
    jest.spyOn(app.get(PodDiscoveryService), 'discover').mockRejectedValue(new Error('resolver unavailable'));

    const response = await fetch(`${baseUrl}/metrics`);

    expect(response.status).toBe(500);
    expect(await response.text()).toBe('Error: resolver unavailable');
  });
});

import {
  DisputeEligibilityJobRunner,
  DisputeEligibilityScanner,
  EligibilityResult,
} from '../../src/jobs/dispute-eligibility';
import { InMemoryEscrowStore } from '../fakes/in-memory-store';
import { BLOCKCHAIN_LISTING_ID, NOW, buildListing, buildOrder } from '../fixtures/escrow';

const HOUR_MS = 3600 * 1000;

describe('DisputeEligibilityScanner', () => {
  let store: InMemoryEscrowStore;
  let scanner: DisputeEligibilityScanner;

  beforeEach(() => {
    store = new InMemoryEscrowStore();
    scanner = new DisputeEligibilityScanner({
      orders: store.orders,
      graceSeconds: 3600,
      batchSize: 2,
      now: () => NOW,
    });
  });

  function seedDelivered(id: string, deliveredAt: Date | null, status: 'delivered' | 'paid' = 'delivered'): string {
    const listing = store.seedListing(buildListing({ status: 'delivered', blockchainListingId: id }));
    return store.seedOrder(buildOrder(listing, { status, deliveredAt })).id;
  }

  it('returns delivered orders past the grace window, oldest first', async () => {
    const recent = seedDelivered('0x01', new Date(NOW.getTime() - 30 * 60 * 1000));
    const old = seedDelivered('0x02', new Date(NOW.getTime() - 5 * HOUR_MS));
    const older = seedDelivered(BLOCKCHAIN_LISTING_ID, new Date(NOW.getTime() - 6 * HOUR_MS));
    seedDelivered('0x03', null, 'paid');

    const result = await scanner.scan();

    expect(result.cutoff).toEqual(new Date('2025-12-31T23:00:00.000Z'));
    expect(result.count).toBe(2);
    expect(result.eligible.map((order) => order.id)).toEqual([older, old]);
    expect(result.eligible[0].blockchainListingId).toBe(BLOCKCHAIN_LISTING_ID);
    expect(result.eligible.map((order) => order.id)).not.toContain(recent);
  });

  it('limits a sweep to the batch size', async () => {
    seedDelivered('0x01', new Date(NOW.getTime() - 2 * HOUR_MS));
    seedDelivered('0x02', new Date(NOW.getTime() - 3 * HOUR_MS));
    seedDelivered('0x03', new Date(NOW.getTime() - 4 * HOUR_MS));

    const result = await scanner.scan();

    expect(result.count).toBe(2);
  });

  it('excludes an order delivered exactly at the cutoff', async () => {
    seedDelivered('0x01', new Date(NOW.getTime() - HOUR_MS));

    const result = await scanner.scan();

    expect(result.eligible).toEqual([]);
  });

  it('changes no order', async () => {
    const id = seedDelivered('0x01', new Date(NOW.getTime() - 2 * HOUR_MS));

    await scanner.scan();

    expect((await store.orders.findById(id))?.status).toBe('delivered');
    expect(store.transactions).toBe(0);
  });
});

describe('DisputeEligibilityJobRunner', () => {
  const emptyResult: EligibilityResult = { eligible: [], count: 0, cutoff: NOW, duration: 0 };
  let scanner: DisputeEligibilityScanner;
  let runner: DisputeEligibilityJobRunner;

  beforeEach(() => {
    scanner = new DisputeEligibilityScanner({
      orders: new InMemoryEscrowStore().orders,
      graceSeconds: 3600,
      batchSize: 10,
      now: () => NOW,
    });
    runner = new DisputeEligibilityJobRunner(scanner, 1000);
  });

  afterEach(() => {
    runner.stop();
    jest.useRealTimers();
  });

  it('skips a run while the previous one is in flight', async () => {
    let finish: (result: EligibilityResult) => void = () => undefined;
    jest.spyOn(scanner, 'scan').mockReturnValue(
      new Promise<EligibilityResult>((resolve) => {
        finish = resolve;
      })
    );

    const first = runner.runJob();
    const second = await runner.runJob();
    finish(emptyResult);

    expect(second).toBeNull();
    await expect(first).resolves.toBe(emptyResult);
    expect(runner.latest).toBe(emptyResult);
  });

  it('keeps running after a failed sweep', async () => {
    jest.spyOn(scanner, 'scan').mockRejectedValueOnce(new Error('connection terminated'));

    await expect(runner.runJob()).resolves.toBeNull();
    await expect(runner.runJob()).resolves.toEqual(expect.objectContaining({ count: 0 }));
  });

  it('sweeps on start and then on every interval until stopped', async () => {
    jest.useFakeTimers();
    const scan = jest.spyOn(scanner, 'scan').mockResolvedValue(emptyResult);

    runner.start();
    await jest.advanceTimersByTimeAsync(2500);
    runner.stop();
    await jest.advanceTimersByTimeAsync(5000);

    expect(scan).toHaveBeenCalledTimes(3);
    expect(runner.running).toBe(false);
  });
});

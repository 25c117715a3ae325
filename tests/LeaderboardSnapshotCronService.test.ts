import { DataSource } from 'typeorm';
import { LeaderboardSnapshotCronService } from '../src/services/LeaderboardSnapshotCronService';
import { ScoreLedgerService } from '../src/services/ScoreLedgerService';
import { HistoricalLeaderboardEntry } from '../src/models/HistoricalLeaderboardEntry';
import { LeaderboardPeriod } from '../src/utils/leaderboardPeriods';
import { FakeClock, createTestDataSource, createUser } from './helpers/testDataSource';

describe('LeaderboardSnapshotCronService', () => {
  let dataSource: DataSource;
  let clock: FakeClock;
  let cronService: LeaderboardSnapshotCronService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    clock = new FakeClock('2024-03-13T12:00:00.000Z');
    const options = { dataSource, clock: clock.now, timezone: 'UTC' };
    const user = await createUser(dataSource, 'alice');
    await new ScoreLedgerService(options).addCommentPoints(user.id);
    cronService = new LeaderboardSnapshotCronService(options);
  });

  afterEach(async () => {
    cronService.stop();
    await dataSource.destroy();
  });

  it('saves a snapshot on demand and records the run', async () => {
    const result = await cronService.runNow(LeaderboardPeriod.WEEKLY);

    expect(result).toEqual({ periodType: LeaderboardPeriod.WEEKLY, year: 2024, periodNumber: 11, saved: 1, pruned: 0 });
    expect(cronService.getStatus()).toMatchObject({
      running: false,
      isProcessing: false,
      lastRun: result,
      lastRunAt: new Date('2024-03-13T12:00:00.000Z'),
    });
  });

  it('skips a run while another one is in progress', async () => {
    const first = cronService.runNow(LeaderboardPeriod.WEEKLY);
    const second = await cronService.runNow(LeaderboardPeriod.MONTHLY);

    expect(second).toBeNull();
    expect((await first)?.saved).toBe(1);
    expect(await dataSource.getRepository(HistoricalLeaderboardEntry).countBy({ periodType: LeaderboardPeriod.MONTHLY })).toBe(0);
  });

  it('only saves the monthly snapshot on the last day of the month', async () => {
    expect(await cronService.tick(LeaderboardPeriod.MONTHLY)).toBeNull();

    clock.set('2024-03-31T23:55:00.000Z');
    const result = await cronService.tick(LeaderboardPeriod.MONTHLY);

    expect(result).toMatchObject({ periodType: LeaderboardPeriod.MONTHLY, year: 2024, periodNumber: 3, saved: 1 });
  });

  it('does not let a failed scheduled run escape', async () => {
    const broken = new LeaderboardSnapshotCronService({ dataSource, clock: clock.now, timezone: 'Mars/Olympus' });

    await expect(broken.tick(LeaderboardPeriod.WEEKLY)).resolves.toBeNull();
    expect(broken.getStatus().isProcessing).toBe(false);
  });

  it('starts and stops both schedules', () => {
    cronService.start();
    expect(cronService.getStatus()).toMatchObject({
      running: true,
      weeklySchedule: '55 23 * * 0',
      monthlySchedule: '55 23 28-31 * *',
      timezone: 'UTC',
    });

    cronService.stop();
    expect(cronService.getStatus().running).toBe(false);
  });

  it('rejects an invalid schedule', () => {
    const invalid = new LeaderboardSnapshotCronService({ dataSource, clock: clock.now, timezone: 'UTC', weeklySchedule: 'every sunday' });

    expect(() => invalid.start()).toThrow('Invalid cron expression "every sunday"');
  });
});

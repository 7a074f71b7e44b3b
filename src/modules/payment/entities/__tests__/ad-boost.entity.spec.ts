import { makeAdBoost } from '../../../../test-utils/factories';
import { BoostStatus } from '../ad-boost.entity';

describe('AdBoost', () => {
  const now = new Date('2025-03-10T12:00:00.000Z');

  it('defaults to a pending 7-day boost', () => {
    const boost = makeAdBoost();

    expect(boost.status).toBe(BoostStatus.PENDING);
    expect(boost.durationDays).toBe(7);
    expect(boost.isActive(now)).toBe(false);
  });

  it('runs for the purchased number of days once activated', () => {
    const boost = makeAdBoost({ durationDays: 3 });

    boost.activate(now);

    expect(boost.status).toBe(BoostStatus.ACTIVE);
    expect(boost.startDate).toEqual(now);
    expect(boost.endDate).toEqual(new Date('2025-03-13T12:00:00.000Z'));
    expect(boost.isActive(new Date('2025-03-13T11:59:59.999Z'))).toBe(true);
    expect(boost.isActive(new Date('2025-03-13T12:00:00.001Z'))).toBe(false);
  });

  it('is inactive once expired', () => {
    const boost = makeAdBoost();
    boost.activate(now);
    boost.status = BoostStatus.EXPIRED;

    expect(boost.isActive(now)).toBe(false);
  });
});

/**
 * In-memory stand-in for the parts of MikroORM's EntityManager the services
 * use. `transactional` runs its callback against the same mock, and `create`
 * builds real entity instances so entity methods keep working.
 */
export interface MockEntityManager {
  find: jest.Mock;
  findOne: jest.Mock;
  findAndCount: jest.Mock;
  count: jest.Mock;
  create: jest.Mock;
  persist: jest.Mock;
  lock: jest.Mock;
  transactional: jest.Mock;
  fork: jest.Mock;
}

export function createMockEntityManager(): MockEntityManager {
  const em: MockEntityManager = {
    find: jest.fn().mockResolvedValue([]),
    findOne: jest.fn().mockResolvedValue(null),
    findAndCount: jest.fn().mockResolvedValue([[], 0]),
    count: jest.fn().mockResolvedValue(0),
    create: jest.fn(<T extends object>(entityClass: new () => T, data: Partial<T>) =>
      Object.assign(new entityClass(), data),
    ),
    persist: jest.fn(),
    lock: jest.fn().mockResolvedValue(undefined),
    transactional: jest.fn(),
    fork: jest.fn(),
  };
  em.transactional.mockImplementation(async (work: (tx: MockEntityManager) => Promise<unknown>) => work(em));
  em.fork.mockReturnValue(em);
  return em;
}

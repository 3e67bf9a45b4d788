import { collectProgress, createProgressEmitter } from '@core/workflow/progress';

describe('createProgressEmitter', () => {
  it('should stamp events and keep their order', () => {
    const { events, sink } = collectProgress();
    const emit = createProgressEmitter(sink, () => new Date(0));

    emit('issue_received', { issue: { key: 'BUG-1' } });
    emit('tests_skipped');

    expect(events).toEqual([
      { event: 'issue_received', timestamp: '1970-01-01T00:00:00.000Z', payload: { issue: { key: 'BUG-1' } } },
      { event: 'tests_skipped', timestamp: '1970-01-01T00:00:00.000Z', payload: {} }
    ]);
  });

  it('should do nothing without a sink', () => {
    const emit = createProgressEmitter();

    expect(() => emit('branch_ready', { branch: 'agent/x' })).not.toThrow();
  });

  it('should propagate sink errors to the caller', () => {
    const emit = createProgressEmitter(() => {
      throw new Error('observer failed');
    });

    expect(() => emit('branch_ready')).toThrow('observer failed');
  });
});

import { SubscriptionRegistry } from './subscription-registry';

describe('SubscriptionRegistry', () => {
  it('adds symbols idempotently', () => {
    const registry = new SubscriptionRegistry();

    registry.add('MES');
    registry.add('MES');
    registry.add('NQ', ['quotes']);

    expect(registry.size).toBe(2);
    expect(registry.current()).toEqual(['MES', 'NQ']);
    expect(registry.entries()).toEqual([{ symbol: 'MES' }, { symbol: 'NQ', dataTypes: ['quotes'] }]);
  });

  it('keeps the latest data-type filter for a symbol', () => {
    const registry = new SubscriptionRegistry();

    registry.add('ES', ['trades']);
    registry.add('ES', ['trades', 'depth']);

    expect(registry.entries()).toEqual([{ symbol: 'ES', dataTypes: ['trades', 'depth'] }]);
  });

  it('removes and clears', () => {
    const registry = new SubscriptionRegistry();
    registry.add('MES');
    registry.add('YM');

    expect(registry.remove('MES')).toBe(true);
    expect(registry.remove('MES')).toBe(false);
    expect(registry.has('YM')).toBe(true);

    registry.clear();
    expect(registry.current()).toEqual([]);
  });
});

import { readTableHeaderFields } from './table-header-fields';

const columnGrid = [
  ['CUSTOMER #', 'SALES ORDER #', 'CUSTOMER PO'],
  ['87654321', '123123123', 'PO-1'],
];

const labelledGrid = [
  ['NO. OF CARTONS: 7', 'GROSS WEIGHT', '55.500 LB'],
  ['NET WEIGHT'],
  ['50.000 LB'],
];

describe('readTableHeaderFields', () => {
  it('reads column headings and labelled cells', () => {
    expect(readTableHeaderFields([columnGrid, labelledGrid])).toEqual({
      customerId: '87654321',
      salesOrderId: '123123123',
      customerPo: 'PO-1',
      cartonsCount: 7,
      cartonsGrossWeight: { value: 55.5, unit: 'LB' },
      cartonsNetWeight: { value: 50, unit: 'LB' },
    });
  });

  it('keeps the value from the earliest grid', () => {
    const later = [['CUSTOMER #'], ['11112222']];

    expect(readTableHeaderFields([columnGrid, later]).customerId).toBe('87654321');
  });

  it('skips values with the wrong shape', () => {
    const grid = [['CUSTOMER #', 'SALES ORDER #'], ['ABC', '12345']];

    expect(readTableHeaderFields([grid])).toEqual({});
  });

  it('returns nothing for grids without a value row', () => {
    expect(readTableHeaderFields([[['CUSTOMER #']]])).toEqual({});
    expect(readTableHeaderFields([])).toEqual({});
  });
});

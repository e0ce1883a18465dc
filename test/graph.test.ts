import { expect } from 'chai';
import { field, type } from '../src/builders';
import { getFieldRows } from '../src/graph';

describe('getFieldRows', () => {
  it('puts the identifier first', () => {
    const id = field('id', 'int');
    const name = field('name', 'string');
    const age = field('age', 'int');
    expect(getFieldRows(type('User', { id, fields: [name, age] }))).to.eql([id, name, age]);
  });

  it('returns declared fields when there is no identifier', () => {
    const name = field('name', 'string');
    expect(getFieldRows(type('User', { fields: [name] }))).to.eql([name]);
  });
});

import { expect } from 'chai';
import { edge, field } from '../../src/builders';
import { edgeColumns, extractRows, fieldColumns } from '../../src/printer/columns';

describe('fieldColumns', () => {
  it('has the field headers in order', () => {
    expect(fieldColumns.map((c) => c.header)).to.eql([
      'Field',
      'Type',
      'Unique',
      'Optional',
      'Nillable',
      'Default',
      'UpdateDefault',
      'Immutable',
      'StructTag',
      'Validators',
      'Comment',
    ]);
  });

  it('extracts every field attribute', () => {
    const f = field('email', 'string', {
      unique: true,
      nillable: true,
      updateDefault: true,
      structTag: 'json:"email,omitempty"',
      validators: ['MaxLen'],
      comment: 'login address',
    });
    expect(extractRows(fieldColumns, [f])).to.eql([
      ['email', 'string', 'true', 'false', 'true', 'false', 'true', 'false', 'json:"email,omitempty"', 'MaxLen', 'login address'],
    ]);
  });

  it('never auto-aligns comments', () => {
    expect(fieldColumns[fieldColumns.length - 1]).to.include({ header: 'Comment', align: 'left' });
  });
});

describe('edgeColumns', () => {
  it('has the edge headers in order', () => {
    expect(edgeColumns.map((c) => c.header)).to.eql([
      'Edge',
      'Type',
      'Inverse',
      'BackRef',
      'Relation',
      'Unique',
      'Optional',
      'Comment',
    ]);
  });

  it('extracts every edge attribute', () => {
    const e = edge('group', 'Group', 'M2O', { inverse: 'users', unique: true, comment: 'owning group' });
    expect(extractRows(edgeColumns, [e])).to.eql([
      ['group', 'Group', 'true', 'users', 'M2O', 'true', 'false', 'owning group'],
    ]);
  });

  it('uses default alignment only', () => {
    expect(edgeColumns.every((c) => c.align === 'left')).to.be.true;
  });
});

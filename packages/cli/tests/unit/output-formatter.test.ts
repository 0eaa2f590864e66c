import { describe, it, expect } from 'vitest';
import {
  formatKeyValue,
  formatOutput,
  formatTable,
  renderCommandOutput,
} from '../../src/core/output-formatter.js';

describe('output-formatter', () => {
  describe('formatTable', () => {
    it('pads columns to the widest cell', () => {
      const table = formatTable([
        { address: '1.2.3.4', description: 'seed' },
        { address: '10.20.30.40', description: 'Added by addrset' },
      ]);

      expect(table.split('\n')).toEqual([
        'address     | description     ',
        '------------|-----------------',
        '1.2.3.4     | seed            ',
        '10.20.30.40 | Added by addrset',
      ]);
    });

    it('collects columns from every row', () => {
      const table = formatTable([{ address: '1.2.3.4' }, { address: '5.6.7.8', ttl: 60 }]);

      expect(table.split('\n')).toEqual([
        'address | ttl',
        '--------|----',
        '1.2.3.4 |    ',
        '5.6.7.8 | 60 ',
      ]);
    });

    it('says so when there is nothing to show', () => {
      expect(formatTable([])).toBe('No data to display');
    });
  });

  describe('formatKeyValue', () => {
    it('renders one row per field, nested values as JSON', () => {
      expect(formatKeyValue({ id: 'bl-1', entries: [{ address: '1.2.3.4' }] }).split('\n')).toEqual([
        'field   | value                  ',
        '--------|------------------------',
        'id      | bl-1                   ',
        'entries | [{"address":"1.2.3.4"}]',
      ]);
    });
  });

  describe('formatOutput', () => {
    it('prints scalars as text in table mode', () => {
      expect(formatOutput(true, 'table')).toBe('true');
      expect(formatOutput('ok', 'table')).toBe('ok');
    });

    it('prints indented JSON in json mode', () => {
      expect(formatOutput({ isMember: false }, 'json')).toBe('{\n  "isMember": false\n}');
    });
  });

  describe('renderCommandOutput', () => {
    it('puts the title above the table', () => {
      const rendered = renderCommandOutput(
        { title: 'IP Addresses in Address Set', display: [{ address: '1.2.3.4' }], raw: [] },
        'table'
      );

      expect(rendered).toBe('IP Addresses in Address Set\naddress\n-------\n1.2.3.4');
    });

    it('prints the raw value for json', () => {
      const rendered = renderCommandOutput({ title: 'ignored', display: 'shown', raw: { outcome: 'unchanged' } }, 'json');

      expect(rendered).toBe('{\n  "outcome": "unchanged"\n}');
    });
  });
});

import { describe, it, expect } from 'vitest';
import { QueryEngine } from '../../core/QueryEngine';
import { MemoryAdapter } from '../../adapters/MemoryAdapter';
import { RemoteAdapter } from '../../adapters/RemoteAdapter';
import type { RemoteDescriptor } from '../../sql/ast-types';
import { Relation } from '../../internals/relation';
import {
  ColumnNotFoundError,
  ColumnNotInGroupByError,
  ExtractFailedError,
  UnknownSourceTypeError,
  UnsupportedStatementError,
} from '../../errors';

function salesEngine() {
  const memory = new MemoryAdapter({
    sales: new Relation(['region', 'amount'], [
      ['east', 10],
      ['west', 5],
      ['east', 20],
    ]),
  });
  return { memory, engine: new QueryEngine({ adapters: [memory] }) };
}

function joinEngine() {
  const memory = new MemoryAdapter({
    orders: new Relation(['order_id', 'cust_id', 'name'], [
      [1, 10, 'first'],
      [2, 20, 'second'],
    ]),
    customers: new Relation(['id', 'name', 'region_id'], [
      [10, 'Ann', 100],
      [20, 'Bob', 200],
    ]),
    regions: new Relation(['id', 'label'], [
      [100, 'North'],
      [200, 'South'],
    ]),
  });
  return new QueryEngine({ adapters: [memory] });
}

describe('QueryEngine', () => {
  describe('scenarios', () => {
    it('should total amounts per region in first-seen order', async () => {
      const { engine } = salesEngine();
      const result = await engine.execute('SELECT region, sum(amount) FROM sales GROUP BY region;');
      expect(result.columns).toEqual(['region', 'sum(amount)']);
      expect(result.rows).toEqual([
        ['east', 30],
        ['west', 5],
      ]);
    });

    it('should order descending and limit', async () => {
      const { engine } = salesEngine();
      const result = await engine.execute('SELECT * FROM sales ORDER BY amount DESC LIMIT 2;');
      expect(result.rows).toEqual([
        ['east', 20],
        ['east', 10],
      ]);
    });

    it('should aggregate a filtered relation into a single row', async () => {
      const { engine } = salesEngine();
      const result = await engine.execute("SELECT sum(amount) FROM sales WHERE region = 'east';");
      expect(result.columns).toEqual(['sum(amount)']);
      expect(result.rows).toEqual([[30]]);
    });

    it('should order groups by a selected aggregation position', async () => {
      const { engine } = salesEngine();
      const result = await engine.execute('SELECT region, sum(amount) FROM sales GROUP BY region ORDER BY #1 ASC;');
      expect(result.rows).toEqual([
        ['west', 5],
        ['east', 30],
      ]);
    });

    it('should reject a selected column outside GROUP BY', async () => {
      const { engine } = salesEngine();
      await expect(engine.execute('SELECT region FROM sales GROUP BY amount;')).rejects.toBeInstanceOf(
        ColumnNotInGroupByError,
      );
    });

    it('should return the left relation when a left join meets an empty right', async () => {
      const memory = new MemoryAdapter({
        orders: new Relation(['order_id', 'cust_id'], [
          [1, 10],
          [2, 20],
        ]),
        customers: Relation.empty(['id', 'name']),
      });
      const engine = new QueryEngine({ adapters: [memory] });
      const result = await engine.execute('SELECT * FROM orders LEFT JOIN customers ON cust_id = id;');
      expect(result.columns).toEqual(['order_id', 'cust_id']);
      expect(result.rows).toEqual([
        [1, 10],
        [2, 20],
      ]);
    });
  });

  describe('qualified columns', () => {
    it('should resolve aliases through a join', async () => {
      const result = await joinEngine().execute(
        'SELECT o.order_id, c.region_id FROM orders AS o JOIN customers AS c ON c.id = o.cust_id ORDER BY c.region_id DESC;',
      );
      expect(result.columns).toEqual(['order_id', 'region_id']);
      expect(result.rows).toEqual([
        [2, 200],
        [1, 100],
      ]);
    });

    it('should follow suffixed names shared by both sides', async () => {
      const result = await joinEngine().execute(
        'SELECT o.name, c.name FROM orders AS o JOIN customers AS c ON o.cust_id = c.id WHERE c.name = \'Bob\';',
      );
      expect(result.columns).toEqual(['name_left', 'name_right']);
      expect(result.rows).toEqual([['second', 'Bob']]);
    });

    it('should carry scopes across chained joins', async () => {
      const result = await joinEngine().execute(
        'SELECT o.order_id, c.id, r.label FROM orders AS o ' +
          'JOIN customers AS c ON o.cust_id = c.id ' +
          'JOIN regions AS r ON c.region_id = r.id ' +
          'ORDER BY o.order_id DESC;',
      );
      expect(result.columns).toEqual(['order_id', 'id_left', 'label']);
      expect(result.rows).toEqual([
        [2, 20, 'South'],
        [1, 10, 'North'],
      ]);
    });

    it('should use implicit aliases of bare names', async () => {
      const result = await joinEngine().execute(
        'SELECT regions.label FROM customers JOIN regions ON customers.region_id = regions.id WHERE customers.id = 10;',
      );
      expect(result.rows).toEqual([['North']]);
    });

    it('should report qualified columns the relation lacks', async () => {
      await expect(joinEngine().execute('SELECT o.price FROM orders AS o;')).rejects.toThrow(
        "Column 'o.price' not found. Available: order_id, cust_id, name",
      );
      await expect(joinEngine().execute('SELECT o.price FROM orders AS o;')).rejects.toBeInstanceOf(
        ColumnNotFoundError,
      );
    });
  });

  describe('loading', () => {
    it('should load SELECT INTO results and return them', async () => {
      const { engine, memory } = salesEngine();
      const result = await engine.execute('SELECT region INTO {memory:big} FROM sales WHERE amount > 5;');
      expect(result.rows).toEqual([['east'], ['east']]);
      expect(memory.get('big')?.rows).toEqual([['east'], ['east']]);
    });

    it('should append INSERT values by position or by name', async () => {
      const { engine, memory } = salesEngine();
      await engine.execute("INSERT INTO sales VALUES ('north', 7);");
      await engine.execute('INSERT INTO sales (amount) VALUES (3), (4);');
      expect(memory.get('sales')?.rows).toEqual([
        ['east', 10],
        ['west', 5],
        ['east', 20],
        ['north', 7],
        [null, 3],
        [null, 4],
      ]);
    });
  });

  describe('join qualifiers', () => {
    function chainEngine(first: Relation) {
      const memory = new MemoryAdapter({
        a: first,
        b: new Relation(['k', 'm'], [[1, 5]]),
        c: new Relation(['m', 'w'], [[5, 'c5']]),
      });
      return new QueryEngine({ adapters: [memory] });
    }

    it('should reject an ON qualifier naming a later source', async () => {
      const engine = chainEngine(new Relation(['k', 'm'], [[1, 5]]));
      await expect(
        engine.execute('SELECT * FROM a AS x JOIN b AS y ON y.k = z.m JOIN c AS z ON x.m = z.m;'),
      ).rejects.toThrow("Unknown table alias 'z'. Declared: x, y");
    });

    it('should reject a qualified key whose source left no columns behind', async () => {
      const engine = chainEngine(Relation.empty(['k', 'm']));
      const query = 'SELECT * FROM a AS x RIGHT JOIN b AS y ON x.k = y.k JOIN c AS z ON x.m = z.m;';
      await expect(engine.execute(query)).rejects.toBeInstanceOf(ColumnNotFoundError);
      await expect(engine.execute(query)).rejects.toThrow("Column 'x.m' not found. Available: k, m");
    });

    it('should keep empty-input rules ahead of key resolution', async () => {
      const engine = chainEngine(Relation.empty(['k', 'm']));
      const result = await engine.execute('SELECT * FROM a AS x JOIN b AS y ON x.k = y.k JOIN c AS z ON x.m = z.m;');
      expect(result.columns).toEqual([]);
      expect(result.rows).toEqual([]);
    });
  });

  describe('failures', () => {
    it('should surface adapter errors', async () => {
      const { engine } = salesEngine();
      await expect(engine.execute('SELECT * FROM {csv:x.csv};')).rejects.toBeInstanceOf(UnknownSourceTypeError);
      await expect(engine.execute('SELECT * FROM missing;')).rejects.toBeInstanceOf(ExtractFailedError);
    });

    it('should refuse UPDATE and DELETE', async () => {
      const { engine } = salesEngine();
      await expect(engine.execute("UPDATE sales SET region = 'x';")).rejects.toBeInstanceOf(UnsupportedStatementError);
    });

    it('should leave sources untouched when a statement fails', async () => {
      const { engine, memory } = salesEngine();
      await expect(engine.execute('SELECT nope INTO {memory:out} FROM sales;')).rejects.toBeInstanceOf(
        ColumnNotFoundError,
      );
      expect(memory.get('out')).toBeUndefined();
    });
  });

  it('should aggregate rows collected from a remote source', async () => {
    const requested: RemoteDescriptor[] = [];
    const remote = new RemoteAdapter({
      collect: async descriptor => {
        requested.push(descriptor);
        return [
          { date: '2023-01-05', ndvi: 0.25 },
          { date: '2023-01-15', ndvi: 0.75 },
        ];
      },
    });
    const engine = new QueryEngine({ adapters: [remote] });
    const result = await engine.execute(
      'SELECT avg(ndvi), count(*) FROM {gee:proj|COPERNICUS/S2|2023-01-01|2023-02-01|31.2|30.0|10};',
    );
    expect(result.columns).toEqual(['avg(ndvi)', 'count(*)']);
    expect(result.rows).toEqual([[0.5, 2]]);
    expect(requested).toHaveLength(1);
    expect(requested[0]?.dataset).toBe('COPERNICUS/S2');
  });

  it('should compile without touching adapters', () => {
    const { statement, plan } = new QueryEngine({ adapters: [] }).compile('SELECT * FROM anywhere;');
    expect(statement.type).toBe('SELECT');
    expect(plan.output).toBe('transform');
  });

  it('should run independent queries concurrently', async () => {
    const { engine } = salesEngine();
    const [east, west] = await Promise.all([
      engine.execute("SELECT amount FROM sales WHERE region = 'east';"),
      engine.execute("SELECT amount FROM sales WHERE region = 'west';"),
    ]);
    expect(east.rows).toEqual([[10], [20]]);
    expect(west.rows).toEqual([[5]]);
  });
});

import type { QueryRow } from '../cassandra/session.js';
import type { Exercise } from '../core/types.js';

/**
 * Cassandra is a column-oriented database with eventual consistency, designed to scale over many
 * nodes with no single point of failure. Tables are designed query first: there are no joins, and
 * rows are looked up by their partition key.
 *
 * Start a node before running these exercises, e.g.
 *   docker run --name cassandra -p 9042:9042 -d cassandra:latest
 */

export interface User {
  id: string;
  name: string;
  age: number;
}

export const KEYSPACE = 'education';

export const SEED_USERS: User[] = [
  { id: '123', name: 'jon', age: 32 },
  { id: '456', name: 'mary', age: 25 },
];

// Users the learner adds with plain INSERT statements.
export const MORE_USERS: User[] = [
  { id: '3', name: 'Emma-Sophie', age: 15 },
  { id: '4', name: 'Maria', age: 28 },
  { id: '5', name: 'Mario', age: 39 },
  { id: '6', name: 'Elena', age: 31 },
  { id: '7', name: 'Andrew', age: 64 },
  { id: '8', name: 'Panagiotis', age: 66 },
  { id: '9', name: 'Anastasios', age: 39 },
  { id: '10', name: 'Pierre', age: 77 },
  { id: '11', name: 'Logan', age: 58 },
  { id: '12', name: 'George', age: 62 },
  { id: '13', name: 'Elise', age: 91 },
  { id: '14', name: 'Alan', age: 22 },
  { id: '15', name: 'Dimitrios', age: 38 },
  { id: '16', name: 'Georgios', age: 14 },
];

export function toUser(row: QueryRow): User {
  const id = row.get('id');
  const name = row.get('name');
  const age = row.get('age');
  if (typeof id !== 'string' || typeof name !== 'string' || typeof age !== 'number') {
    throw new Error(`Row is not a user: id=${String(id)}, name=${String(name)}, age=${String(age)}`);
  }
  return { id, name, age };
}

const sameUser = (a: User | undefined, b: User): boolean =>
  a !== undefined && a.id === b.id && a.name === b.name && a.age === b.age;

export const checkCluster: Exercise = {
  id: 'cluster',
  title: 'Check the cluster',
  description: 'Read system.local and system.peers to discover the nodes',
  order: 10,
  async run({ session, comment, check, display, todo }) {
    // The node we are connected to describes itself in system.local.
    const local = await session.execute('SELECT * FROM system.local');
    display(local);

    const bootstrapped = local.rows[0]?.get('bootstrapped');
    comment(
      local.rows.length === 1 && bootstrapped === 'COMPLETED'
        ? 'Cassandra is ready'
        : 'Cassandra is not ready',
    );
    check(local.rows.length === 1, 'Do we have 1 local node?');
    check(bootstrapped === 'COMPLETED', 'Is the local node ready?');

    const peers = await session.execute('SELECT * FROM system.peers');
    display(peers);

    comment('How many nodes do we have in the Cassandra cluster?');
    const expectedNodes = todo<number>('replace with the number of nodes of your cluster');
    check(peers.rows.length + 1 === expectedNodes, 'Node count matches');
  },
};

export const createKeyspace: Exercise = {
  id: 'keyspace',
  title: 'Create a keyspace',
  description: `Create the ${KEYSPACE} keyspace, replicated on every node`,
  order: 20,
  ignored: true,
  async run({ session }) {
    // Set the replication factor to the number of available nodes.
    await session.execute(`CREATE KEYSPACE IF NOT EXISTS ${KEYSPACE} WITH replication = {
  'class':              'SimpleStrategy',
  'replication_factor': '3'
}`);
  },
};

export const createTable: Exercise = {
  id: 'table',
  title: 'Create a table',
  description: 'Create the user table with id, name and age',
  order: 30,
  dependsOn: ['keyspace'],
  async run({ session }) {
    await session.execute(`DROP TABLE IF EXISTS ${KEYSPACE}.user`);
    await session.execute(`CREATE TABLE IF NOT EXISTS ${KEYSPACE}.user (
  id   text,
  name text,
  age  int,
  PRIMARY KEY (id, name)
)`);
  },
};

export const addData: Exercise = {
  id: 'insert',
  title: 'Add data',
  description: 'Insert users, with the JSON syntax and with plain INSERT statements',
  order: 40,
  dependsOn: ['table'],
  async run({ session }) {
    // CQL accepts a whole row as a JSON document.
    for (const user of SEED_USERS) {
      await session.execute(`INSERT INTO ${KEYSPACE}.user JSON '${JSON.stringify(user)}'`);
    }
    for (const user of MORE_USERS) {
      await session.execute(
        `INSERT INTO ${KEYSPACE}.user (id, name, age) VALUES (?, ?, ?)`,
        [user.id, user.name, user.age],
        { prepare: true },
      );
    }
  },
};

export const queryData: Exercise = {
  id: 'select',
  title: 'Query data',
  description: 'Select all users; LIMIT keeps exploration queries small',
  order: 50,
  dependsOn: ['insert'],
  async run({ session, comment, display }) {
    const result = await session.execute(`SELECT id, name, age FROM ${KEYSPACE}.user LIMIT 100`);
    comment('List of all users');
    display(result);
  },
};

export const queryJson: Exercise = {
  id: 'select-json',
  title: 'Query data as JSON document',
  description: 'Select all users, one JSON document per row',
  order: 60,
  dependsOn: ['insert'],
  async run({ session, comment, display }) {
    const result = await session.execute(`SELECT JSON id, name, age FROM ${KEYSPACE}.user LIMIT 100`);
    comment('List of all users (JSON)');
    display(result);
  },
};

export const queryWithConstraint: Exercise = {
  id: 'select-where',
  title: 'Query with constraint',
  description: "Select the user with id '123'",
  order: 70,
  dependsOn: ['insert'],
  async run({ session, comment, check, display }) {
    const result = await session.execute(
      `SELECT id, name, age FROM ${KEYSPACE}.user WHERE id = '123' LIMIT 100`,
    );
    comment('Data collected');
    display(result);

    check(result.rows.length === 1, 'Did we get 1 user?');
    check(result.rows[0]?.get('id') === '123', "Does the collected user have ID '123'?");
  },
};

export const preparedStatement: Exercise = {
  id: 'prepared',
  title: 'Use prepared statement',
  description: 'Find a user by id with a bound parameter instead of string concatenation',
  order: 80,
  dependsOn: ['insert'],
  async run({ session, check }) {
    // A `?` placeholder is bound to a value at execution time, which guards against CQL injection.
    const findUserById = async (id: string): Promise<User | undefined> => {
      const result = await session.execute(
        `SELECT id, name, age FROM ${KEYSPACE}.user WHERE id = ?`,
        [id],
        { prepare: true },
      );
      check(result.rows.length === 1, 'Did we get 1 user?');
      const [row] = result.rows;
      return row ? toUser(row) : undefined;
    };

    const user = await findUserById('123');
    check(sameUser(user, { id: '123', name: 'jon', age: 32 }), 'Check collected data');
  },
};

export const findManyUsers: Exercise = {
  id: 'select-in',
  title: 'Find many users',
  description: 'Bind a list of ids to an IN clause',
  order: 90,
  dependsOn: ['insert'],
  async run({ session, check }) {
    const findUsersByIds = async (ids: string[]): Promise<User[]> => {
      const result = await session.execute(
        `SELECT id, name, age FROM ${KEYSPACE}.user WHERE id IN ?`,
        [ids],
        { prepare: true },
      );
      return result.rows.map(toUser);
    };

    const users = await findUsersByIds(['123', '456']);
    check(
      users.length === 2 && sameUser(users[0], SEED_USERS[0]) && sameUser(users[1], SEED_USERS[1]),
      'Check collected data',
    );
  },
};

export const filterNonKey: Exercise = {
  id: 'allow-filtering',
  title: 'Query with constraint on non-key field',
  description: 'Select users aged 30 or more',
  order: 100,
  dependsOn: ['insert'],
  async run({ session, comment, display }) {
    // Without ALLOW FILTERING the node refuses to scan every partition for a non-key column.
    // Fetching the records and filtering them in the application is usually preferable.
    const result = await session.execute(
      `SELECT id, name, age FROM ${KEYSPACE}.user WHERE age >= 30 ALLOW FILTERING`,
    );
    comment('Users greater or equal to 30');
    display(result);
  },
};

export const basicOperations: Exercise[] = [
  checkCluster,
  createKeyspace,
  createTable,
  addData,
  queryData,
  queryJson,
  queryWithConstraint,
  preparedStatement,
  findManyUsers,
  filterNonKey,
];

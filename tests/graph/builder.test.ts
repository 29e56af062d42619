import { GraphBuilder } from '../../src/graph/builder';
import { validateGraph } from '../../src/graph/validator';
import { END, START, NodeHandler, Router } from '../../src/graph/types';
import { GraphValidationError } from '../../src/domain/errors';

interface TestState {
  count: number;
  side?: string;
}

const FIELDS = ['count', 'side'] as const;

const increment: NodeHandler<TestState> = async (state) => ({ count: state.count + 1 });

const sideRouter: Router<TestState, 'left' | 'right'> = {
  outcomes: ['left', 'right'],
  route: (state) => (state.count % 2 === 0 ? 'left' : 'right'),
};

/** A router typed over plain strings, so tables can be deliberately incomplete. */
const looseRouter: Router<TestState, string> = {
  outcomes: ['left', 'right'],
  route: () => 'left',
};

function issueCodes(builder: GraphBuilder<TestState>): string[] {
  try {
    builder.build();
  } catch (err) {
    if (err instanceof GraphValidationError) {
      return err.issues.map((issue) => issue.code);
    }
    throw err;
  }
  return [];
}

describe('GraphBuilder', () => {
  test('builds a linear graph and describes it', () => {
    const graph = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment, { writes: ['count'], description: 'first' })
      .addNode('b', increment, { writes: ['count'] })
      .addEdge(START, 'a')
      .addEdge('a', 'b')
      .addEdge('b', END)
      .build();

    expect(graph.entry).toBe('a');
    expect([...graph.nodes.keys()]).toEqual(['a', 'b']);
    expect(graph.terminals.has('b')).toBe(true);
    expect(graph.describe()).toEqual({
      entry: 'a',
      nodes: [
        { id: 'a', writes: ['count'], description: 'first' },
        { id: 'b', writes: ['count'] },
      ],
      edges: [
        { from: START, to: 'a', kind: 'unconditional' },
        { from: 'a', to: 'b', kind: 'unconditional' },
        { from: 'b', to: END, kind: 'unconditional' },
      ],
      terminals: ['b'],
    });
  });

  test('setEntry and setTerminal are equivalent to START/END edges', () => {
    const graph = new GraphBuilder<TestState>(FIELDS)
      .addNode('only', increment)
      .setEntry('only')
      .setTerminal('only')
      .build();

    expect(graph.entry).toBe('only');
    expect([...graph.terminals]).toEqual(['only']);
  });

  test('a node without outgoing edges finishes the run', () => {
    const graph = new GraphBuilder<TestState>(FIELDS)
      .addNode('only', increment)
      .setEntry('only')
      .build();

    expect(graph.describe().edges).toContainEqual({ from: 'only', to: END, kind: 'unconditional' });
  });

  test('describes each conditional route', () => {
    const graph = new GraphBuilder<TestState>(FIELDS)
      .addNode('decide', increment)
      .addNode('l', increment)
      .addNode('r', increment)
      .setEntry('decide')
      .addConditionalEdge('decide', sideRouter, { left: 'l', right: 'r' })
      .build();

    const conditional = graph.describe().edges.filter((e) => e.kind === 'conditional');
    expect(conditional).toEqual([
      { from: 'decide', to: 'l', kind: 'conditional', outcome: 'left' },
      { from: 'decide', to: 'r', kind: 'conditional', outcome: 'right' },
    ]);
  });

  test('the compiled graph and its parts are frozen', () => {
    const graph = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment, { writes: ['count'] })
      .setEntry('a')
      .build();

    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.nodes.get('a'))).toBe(true);
    expect(Object.isFrozen(graph.fields)).toBe(true);
  });

  test('later builder calls do not affect an already built graph', () => {
    const builder = new GraphBuilder<TestState>(FIELDS).addNode('a', increment).setEntry('a');
    const graph = builder.build();
    builder.addNode('b', increment).addEdge('a', 'b');

    expect(graph.nodes.has('b')).toBe(false);
    expect(graph.edges.has('a')).toBe(false);
  });
});

describe('Graph validation', () => {
  test('rejects duplicate node ids', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .addNode('a', increment)
      .setEntry('a');
    expect(issueCodes(builder)).toEqual(['GRAPH.DUPLICATE_NODE']);
  });

  test('rejects reserved node ids', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode(END, increment)
      .addNode('a', increment)
      .setEntry('a');
    expect(issueCodes(builder)).toEqual(['GRAPH.RESERVED_NODE_ID']);
  });

  test('rejects a graph without an entry', () => {
    const builder = new GraphBuilder<TestState>(FIELDS).addNode('a', increment);
    expect(issueCodes(builder)).toEqual(['GRAPH.MISSING_ENTRY']);
  });

  test('rejects an entry that is not a node', () => {
    const builder = new GraphBuilder<TestState>(FIELDS).addNode('a', increment).setEntry('missing');
    expect(issueCodes(builder)).toEqual(['GRAPH.UNKNOWN_NODE']);
  });

  test('rejects edges to unknown nodes', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .setEntry('a')
      .addEdge('a', 'ghost');
    expect(issueCodes(builder)).toEqual(['GRAPH.UNKNOWN_NODE']);
  });

  test('rejects edges from unknown nodes', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .setEntry('a')
      .addEdge('ghost', 'a');
    expect(issueCodes(builder)).toEqual(['GRAPH.UNKNOWN_NODE']);
  });

  test('rejects writes to undeclared state fields', () => {
    const builder = new GraphBuilder<TestState>(['count'])
      .addNode('a', increment, { writes: ['side'] })
      .setEntry('a');
    expect(issueCodes(builder)).toEqual(['GRAPH.UNKNOWN_FIELD']);
  });

  test('rejects a routing table missing an outcome', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('decide', increment)
      .addNode('l', increment)
      .setEntry('decide')
      .addConditionalEdge('decide', looseRouter, { left: 'l' });
    expect(issueCodes(builder)).toEqual(['GRAPH.ROUTING_TABLE_INCOMPLETE']);
  });

  test('rejects a table missing an outcome named like an Object.prototype member', () => {
    const inherited: Router<TestState, string> = {
      outcomes: ['go', 'constructor'],
      route: () => 'go',
    };
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .addNode('b', increment)
      .setEntry('a')
      .addConditionalEdge('a', inherited, { go: 'b' });
    expect(issueCodes(builder)).toEqual(['GRAPH.ROUTING_TABLE_INCOMPLETE']);
  });

  test('rejects a routing table key the router never produces', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('decide', increment)
      .addNode('l', increment)
      .setEntry('decide')
      .addConditionalEdge('decide', looseRouter, { left: 'l', right: 'l', up: 'l' });
    expect(issueCodes(builder)).toEqual(['GRAPH.ROUTING_TABLE_EXTRA_KEY']);
  });

  test('rejects a routing table that targets an unknown node', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('decide', increment)
      .setEntry('decide')
      .addConditionalEdge('decide', sideRouter, { left: END, right: 'ghost' });
    expect(issueCodes(builder)).toEqual(['GRAPH.UNKNOWN_NODE']);
  });

  test('rejects more than one outgoing edge per node', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .addNode('b', increment)
      .addNode('c', increment)
      .setEntry('a')
      .addEdge('a', 'b')
      .addEdge('a', 'c');
    expect(issueCodes(builder)).toEqual(['GRAPH.AMBIGUOUS_EDGE']);
  });

  test('rejects a terminal with an outgoing edge', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .addNode('b', increment)
      .setEntry('a')
      .setTerminal('a')
      .addEdge('a', 'b');
    expect(issueCodes(builder)).toEqual(['GRAPH.TERMINAL_HAS_EDGE']);
  });

  test('rejects a graph where END cannot be reached', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .addNode('b', increment)
      .setEntry('a')
      .addEdge('a', 'b')
      .addEdge('b', 'a');
    expect(issueCodes(builder)).toEqual(['GRAPH.END_UNREACHABLE']);
  });

  test('accepts a cycle with an exit', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('loop', increment)
      .setEntry('loop')
      .addConditionalEdge('loop', sideRouter, { left: 'loop', right: END });
    expect(issueCodes(builder)).toEqual([]);
  });

  test('reports every structural issue at once', () => {
    const builder = new GraphBuilder<TestState>(FIELDS)
      .addNode('a', increment)
      .addNode('a', increment)
      .addEdge('a', 'ghost');
    expect(issueCodes(builder)).toEqual([
      'GRAPH.DUPLICATE_NODE',
      'GRAPH.MISSING_ENTRY',
      'GRAPH.UNKNOWN_NODE',
    ]);
  });

  test('warns about nodes unreachable from the entry', () => {
    const result = validateGraph<TestState>({
      fields: FIELDS,
      nodes: [
        { id: 'a', handler: increment },
        { id: 'orphan', handler: increment },
      ],
      edges: [],
      entry: 'a',
      terminals: [],
    });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Node "orphan" is not reachable from entry "a"']);
  });
});

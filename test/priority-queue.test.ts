import { PriorityQueue } from '@ramses-link/core';
import { FakeCommand } from './src/fakes.js';

function drain(q: PriorityQueue<FakeCommand>): string[] {
  const out: string[] = [];
  for (let c = q.shift(); c; c = q.shift()) out.push(c.name);
  return out;
}

test('PriorityQueue pops lowest priority first', () => {
  const q = new PriorityQueue<FakeCommand>();
  q.push(new FakeCommand('c', 3));
  q.push(new FakeCommand('a', 1));
  q.push(new FakeCommand('b', 2));

  expect(q.length).toBe(3);
  expect(q.peek()?.name).toBe('a');
  expect(drain(q)).toEqual(['a', 'b', 'c']);
  expect(q.shift()).toBeUndefined();
});

test('PriorityQueue keeps arrival order within a priority', () => {
  const q = new PriorityQueue<FakeCommand>();
  const input: [string, number][] = [
    ['x1', 5], ['y1', 1], ['x2', 5], ['y2', 1], ['z1', 0], ['x3', 5], ['y3', 1], ['z2', 0],
  ];
  for (const [name, p] of input) q.push(new FakeCommand(name, p));

  expect(drain(q)).toEqual(['z1', 'z2', 'y1', 'y2', 'y3', 'x1', 'x2', 'x3']);
});

test('PriorityQueue stays ordered across interleaved push and shift', () => {
  const q = new PriorityQueue<FakeCommand>();
  q.push(new FakeCommand('a', 4));
  q.push(new FakeCommand('b', 2));
  expect(q.shift()?.name).toBe('b');
  q.push(new FakeCommand('c', 4));
  q.push(new FakeCommand('d', 3));
  expect(drain(q)).toEqual(['d', 'a', 'c']);
});

test('PriorityQueue.kill empties the queue', () => {
  const q = new PriorityQueue<FakeCommand>();
  q.push(new FakeCommand('a', 1));
  q.push(new FakeCommand('b', 1));
  q.kill();
  expect(q.length).toBe(0);
  expect(q.shift()).toBeUndefined();
});

import { describe, it, expect } from 'vitest';
import { InteractiveSession } from '../../src/session/interactive.js';
import type { SessionEvent } from '../../src/session/interactive.js';
import { TaskList } from '../../src/tasks/task-list.js';
import { createTodo } from '../../src/types/task.js';
import { MemoryStore } from './memory-store.js';

const clock = () => new Date(2026, 1, 8);

async function* linesOf(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}

function collect(): { events: SessionEvent[]; listener: (e: SessionEvent) => void } {
  const events: SessionEvent[] = [];
  return { events, listener: e => { events.push(e); } };
}

describe('InteractiveSession', () => {
  it('starts running', () => {
    const session = new InteractiveSession(new MemoryStore(), TaskList.empty(), clock);
    expect(session.getState()).toBe('running');
  });

  it('reports each outcome with its rendered lines', async () => {
    const { events, listener } = collect();
    const session = new InteractiveSession(new MemoryStore(), TaskList.empty(), clock);
    await session.run(linesOf(['todo buy milk', 'list']), listener);

    expect(events).toEqual([
      {
        type: 'outcome',
        outcome: { type: 'added', task: createTodo('buy milk'), size: 1 },
        lines: ["Got it. I've added this task:", '  [T][ ] buy milk', 'Now you have 1 task in the list.'],
      },
      {
        type: 'outcome',
        outcome: { type: 'listed', tasks: [createTodo('buy milk')] },
        lines: ['Here are the tasks in your list:', '1.[T][ ] buy milk'],
      },
    ]);
  });

  it('saves and stops on bye, ignoring later input', async () => {
    const store = new MemoryStore();
    const { events, listener } = collect();
    const session = new InteractiveSession(store, TaskList.empty(), clock);

    const state = await session.run(linesOf(['todo a', 'bye', 'todo b']), listener);

    expect(state).toBe('exited');
    expect(session.getTasks().size()).toBe(1);
    expect(store.saved.map(t => t.asSequence())).toEqual([[createTodo('a')]]);
    expect(events.map(e => e.type)).toEqual(['outcome', 'outcome', 'saved']);
    expect(events[2]).toEqual({ type: 'saved', path: 'memory://tasks', count: 1 });
  });

  it('keeps going after a user error', async () => {
    const { events, listener } = collect();
    const session = new InteractiveSession(new MemoryStore(), TaskList.empty(), clock);
    await session.run(linesOf(['done x', 'todo a']), listener);

    const [first, second] = events;
    expect(first?.type === 'outcome' && first.lines).toEqual(['Please give a task number: done <n>']);
    expect(second?.type === 'outcome' && second.outcome.type).toBe('added');
  });

  it('stops without saving when input ends', async () => {
    const store = new MemoryStore();
    const session = new InteractiveSession(store, TaskList.empty(), clock);
    const state = await session.run(linesOf(['todo a']), collect().listener);

    expect(state).toBe('running');
    expect(store.saved).toEqual([]);
  });

  it('reports a failed save and still exits', async () => {
    const store = new MemoryStore();
    store.failSaves = true;
    const { events, listener } = collect();
    const session = new InteractiveSession(store, TaskList.empty(), clock);

    const state = await session.run(linesOf(['bye']), listener);

    expect(state).toBe('exited');
    const last = events[events.length - 1];
    expect(last?.type).toBe('save-failed');
    if (last?.type === 'save-failed') {
      expect(last.error.message).toBe('Could not save tasks to memory://tasks: disk full');
    }
  });

  it('ignores lines after exiting', () => {
    const { events, listener } = collect();
    const session = new InteractiveSession(new MemoryStore(), TaskList.empty(), clock);
    session.handle('bye', listener);
    session.handle('todo a', listener);
    expect(session.getTasks().size()).toBe(0);
    expect(events.map(e => e.type)).toEqual(['outcome', 'saved']);
  });
});

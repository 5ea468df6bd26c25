import { describe, it, expect } from 'vitest';
import { encode, decode } from '../../src/codec/markdown-codec.js';
import { TaskStore } from '../../src/store/task-store.js';
import { Quadrant } from '../../src/types/quadrant.js';
import type { Task } from '../../src/types/task.js';
import { FormatError } from '../../src/errors.js';
import { quadrantOf } from '../../src/classifier/quadrant-classifier.js';
import { IdRegistry } from '../../src/store/id-registry.js';
import { captureLogger, sequentialIds, tickingClock } from '../helpers.js';

const options = () => ({
  logger: captureLogger().logger,
  clock: tickingClock(),
  idFactory: sequentialIds('m'),
  ids: new IdRegistry(),
});

function newStore(): TaskStore {
  return new TaskStore({
    logger: captureLogger().logger,
    clock: tickingClock(),
    idFactory: sequentialIds(),
    ids: new IdRegistry(),
  });
}

/** The fields that survive export/import */
function portable(task: Task) {
  return {
    title: task.title,
    urgent: task.urgent,
    important: task.important,
    tags: [...task.tags],
    dueDate: task.dueDate,
    notes: task.notes,
    completed: task.completed,
  };
}

const byTitle = (a: { title: string }, b: { title: string }) => (a.title < b.title ? -1 : a.title > b.title ? 1 : 0);

describe('encode', () => {
  it('always writes all four sections', () => {
    expect(encode([])).toBe(
      '# Tasks\n\n## Do First (0)\n\n## Schedule (0)\n\n## Delegate (0)\n\n## Eliminate (0)\n',
    );
  });

  it('writes checklist lines with due dates, tags and notes', () => {
    const store = newStore();
    store.add({ title: 'Ship release', urgent: true, important: true, dueDate: '2024-01-01', tags: ['work', 'release'] });
    const call = store.add({ title: 'Call bank', urgent: true, important: true });
    store.toggleCompleted(call.id);
    store.add({ title: 'Read #1 book', important: true, notes: 'chapter 3\nchapter 4' });

    expect(encode(store.list())).toBe([
      '# Tasks',
      '',
      '## Do First (2)',
      '',
      '- [ ] Ship release (due: 2024-01-01) #release #work',
      '- [x] Call bank',
      '',
      '## Schedule (1)',
      '',
      '- [ ] Read \\#1 book',
      '  > chapter 3',
      '  > chapter 4',
      '',
      '## Delegate (0)',
      '',
      '## Eliminate (0)',
      '',
    ].join('\n'));
  });

  it('is deterministic', () => {
    const store = newStore();
    store.add({ title: 'b', tags: ['z', 'y'] });
    store.add({ title: 'a', dueDate: '2024-06-01' });
    expect(encode(store.list())).toBe(encode(store.list()));
  });
});

describe('decode', () => {
  it('round-trips every portable field', () => {
    const store = newStore();
    store.add({ title: 'Plain', urgent: true, important: true });
    store.add({ title: 'fix #12 before launch', important: true, tags: ['bug', 'ui'] });
    store.add({ title: 'x (due: 2024-01-01)', urgent: true, dueDate: '2024-03-01' });
    store.add({ title: 'path a\\b\\', tags: ['files'] });
    store.add({ title: '#leading hash' });
    store.add({ title: 'with notes', important: true, notes: 'line one\n\n  indented' });
    const done = store.add({ title: 'done already', urgent: true, dueDate: '2024-02-02' });
    store.toggleCompleted(done.id);

    const decoded = decode(encode(store.list()), options());

    expect(decoded.map(portable).sort(byTitle)).toEqual(store.list().map(portable).sort(byTitle));
  });

  it('assigns fresh ids and timestamps', () => {
    const [task] = decode('## Do First\n- [ ] one\n', options());
    expect(task?.id).toBe('m1');
    expect(task?.createdAt).toBe('2024-01-10T12:00:00.000Z');
    expect(task?.updatedAt).toBe('2024-01-10T12:00:00.000Z');
  });

  it('puts items under an unknown header into Eliminate', () => {
    const tasks = decode('## Someday maybe\n- [ ] Learn the banjo\n', options());
    expect(tasks).toHaveLength(1);
    expect(tasks[0]?.title).toBe('Learn the banjo');
    expect(tasks.map(quadrantOf)).toEqual([Quadrant.Eliminate]);
  });

  it('puts items before any header into Eliminate', () => {
    const tasks = decode('- [x] Orphan\n## Delegate\n- [ ] Assigned\n', options());
    expect(tasks.map(t => [t.title, quadrantOf(t), t.completed])).toEqual([
      ['Orphan', Quadrant.Eliminate, true],
      ['Assigned', Quadrant.Delegate, false],
    ]);
  });

  it('recognizes headers case-insensitively with or without counts', () => {
    const tasks = decode('### schedule (3)\n* [ ] Dentist\n## DO-FIRST\n- [X] Taxes\n', options());
    expect(tasks.map(quadrantOf)).toEqual([Quadrant.Schedule, Quadrant.DoFirst]);
    expect(tasks[1]?.completed).toBe(true);
  });

  it('drops malformed due dates but keeps the task', () => {
    const [task] = decode('- [ ] Pay rent (due: 2024-02-30) #home\n', options());
    expect(task?.title).toBe('Pay rent');
    expect(task?.dueDate).toBeNull();
    expect(task?.tags).toEqual(['home']);
  });

  it('accepts tags written before the due date', () => {
    const [task] = decode('- [ ] Renew passport #admin (due: 2024-09-01)\n', options());
    expect(task?.title).toBe('Renew passport');
    expect(task?.tags).toEqual(['admin']);
    expect(task?.dueDate).toBe('2024-09-01');
  });

  it('skips unrecognized and empty lines', () => {
    const text = [
      'Some intro paragraph',
      '',
      '## Do First',
      '- not a checklist item',
      '- [ ]',
      '- [?] odd mark',
      '> stray quote',
      '- [ ] Real task',
    ].join('\n');
    expect(decode(text, options()).map(t => t.title)).toEqual(['Real task']);
  });

  it('attaches indented quote lines to the preceding item only', () => {
    const text = '- [ ] First\n  > note a\n  > note b\n\n  > detached\n- [ ] Second\n';
    const tasks = decode(text, options());
    expect(tasks.map(t => t.notes)).toEqual(['note a\nnote b', null]);
  });

  it('handles CRLF line endings and a byte-order mark', () => {
    const tasks = decode('\uFEFF## Schedule\r\n- [ ] Windows line\r\n', options());
    expect(tasks.map(t => t.title)).toEqual(['Windows line']);
    expect(tasks.map(quadrantOf)).toEqual([Quadrant.Schedule]);
  });

  it('decodes UTF-8 bytes', () => {
    const bytes = new TextEncoder().encode('## Do First\n- [ ] Café run #errands\n');
    const [task] = decode(bytes, options());
    expect(task?.title).toBe('Café run');
    expect(task?.tags).toEqual(['errands']);
  });

  it('reads the legacy section titles and check marks', () => {
    const text = '## 重要紧急 (共1项)\n\n- [✓] 写报告\n\n## 不重要不紧急\n- [□] 看电影\n';
    const tasks = decode(text, options());
    expect(tasks.map(t => [t.title, quadrantOf(t), t.completed])).toEqual([
      ['写报告', Quadrant.DoFirst, true],
      ['看电影', Quadrant.Eliminate, false],
    ]);
  });

  it('reads the legacy detail bullets under each item', () => {
    const text = [
      '# 我的任务列表',
      '',
      '## 重要且紧急',
      '- [ ] 完成项目报告',
      '  - 描述: 周五前交季度总结',
      '  - 标签: 工作, 文档',
      '  - 截止: 2025-03-20',
      '',
      '## 重要不紧急',
      '- [ ] 学习新框架',
      '  - 描述: 每天读一章',
      '  - 标签: 学习，编程',
      '',
      '## 不重要紧急',
      '- [ ] 回复邮件',
      '  - 截止: 2025-03-18',
      '',
      '## 不重要不紧急',
      '- [ ] 整理书架',
      '- [ ] 看电影',
    ].join('\n');

    const tasks = decode(text, options());
    expect(tasks.map(t => [t.title, quadrantOf(t), t.tags, t.dueDate, t.notes])).toEqual([
      ['完成项目报告', Quadrant.DoFirst, ['工作', '文档'], '2025-03-20', '周五前交季度总结'],
      ['学习新框架', Quadrant.Schedule, ['学习', '编程'], null, '每天读一章'],
      ['回复邮件', Quadrant.Delegate, [], '2025-03-18', null],
      ['整理书架', Quadrant.Eliminate, [], null, null],
      ['看电影', Quadrant.Eliminate, [], null, null],
    ]);
  });

  it('drops invalid legacy tags and due dates but keeps the item', () => {
    const text = '## 重要且紧急\n- [ ] 交税\n  - 标签: 财务, 有 空格\n  - 截止: 三月底\n';
    const [task] = decode(text, options());
    expect(task?.tags).toEqual(['财务']);
    expect(task?.dueDate).toBeNull();
    expect(task && quadrantOf(task)).toBe(Quadrant.DoFirst);
  });

  it('never reuses an id already issued by the shared registry', () => {
    const ids = new IdRegistry();
    const first = ['aaaa'];
    const second = ['aaaa', 'bbbb'];
    const a = decode('- [ ] one\n', { ...options(), ids, idFactory: () => first.shift() ?? 'zzzz' });
    const b = decode('- [ ] two\n', { ...options(), ids, idFactory: () => second.shift() ?? 'zzzz' });
    expect([...a, ...b].map(t => t.id)).toEqual(['aaaa', 'bbbb']);
  });

  it('fails with FormatError on bytes that are not UTF-8', () => {
    expect(() => decode(new Uint8Array([0x2d, 0x20, 0xff, 0xfe, 0xfd]), options())).toThrow(FormatError);
  });
});

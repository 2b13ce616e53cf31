/**
 * Markdown export tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile, readdir, access } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { createMessage } from '../ingest/slack/messages.js';
import { parseUserDirectory } from '../ingest/slack/users.js';
import { buildChannel, createThread } from '../thread/assemble.js';
import {
  UnknownUserError,
  resolveInitials,
  replaceMentions,
  renderMessage,
  renderThread,
  renderEntry,
  renderChannelDocument,
  renderThreadDocument,
  writeChannelMarkdown,
  writeThreadMarkdownFiles,
} from './markdown.js';

const users = parseUserDirectory([
  {
    id: 'U01ALICE',
    name: 'alice',
    profile: { real_name: 'Alice Liddell', real_name_normalized: 'Alice Liddell' },
  },
  {
    id: 'U02BOB',
    name: 'bob',
    profile: { real_name: 'Bob (Robert) Ross', real_name_normalized: 'Bob (Robert) Ross' },
  },
]);

// 2024-02-01 00:00:00, 00:01:00, 00:02:00 UTC
const T0 = '1706745600';
const T1 = '1706745660';
const T2 = '1706745720';

const head = createMessage('Anyone around?', 'U01ALICE', T0, T0);
const reply1 = createMessage('Yes, <@U01ALICE>', 'U02BOB', T2, T0);
const reply2 = createMessage('Great', 'U01ALICE', T1, T0);
const thread = createThread(head, [reply1, reply2]);

describe('resolveInitials', () => {
  it('should return the initials of a known user', () => {
    expect(resolveInitials('U02BOB', users)).toBe('BR');
  });

  it('should throw UnknownUserError for an unknown id', () => {
    expect(() => resolveInitials('U99NOBODY', users)).toThrow(UnknownUserError);
    expect(() => resolveInitials('U99NOBODY', users)).toThrow('Unknown user id U99NOBODY');
  });
});

describe('replaceMentions', () => {
  it('should replace every mention with emphasised initials', () => {
    expect(replaceMentions('<@U01ALICE> meet <@U02BOB>', users)).toBe('**@AL** meet **@BR**');
  });

  it('should leave non-matching tokens alone', () => {
    expect(replaceMentions('see <#C0123|general> and <@u01alice>', users)).toBe(
      'see <#C0123|general> and <@u01alice>'
    );
  });

  it('should throw for a mention of an unknown user', () => {
    expect(() => replaceMentions('hi <@U77GHOST>', users)).toThrow(UnknownUserError);
  });
});

describe('renderMessage', () => {
  it('should render author initials, text and UTC time', () => {
    expect(renderMessage(reply1, users)).toBe('**BR:** Yes, **@AL** *[2024-02-01 00:02:00 UTC]*');
  });

  it('should fall back to raw ids without a directory', () => {
    expect(renderMessage(reply1)).toBe('**U02BOB:** Yes, <@U01ALICE> *[2024-02-01 00:02:00 UTC]*');
  });

  it('should throw for an unknown author', () => {
    const stranger = createMessage('hello', 'U99NOBODY', T0);
    expect(() => renderMessage(stranger, users)).toThrow(UnknownUserError);
  });
});

describe('renderThread', () => {
  it('should render head, heading and replies in reply order', () => {
    expect(renderThread(thread, users)).toBe(
      '## **AL:** Anyone around? *[2024-02-01 00:00:00 UTC]*\n\n' +
        '### Replies\n' +
        '**BR:** Yes, **@AL** *[2024-02-01 00:02:00 UTC]*\n\n' +
        '**AL:** Great *[2024-02-01 00:01:00 UTC]*'
    );
  });

  it('should render an empty replies section for a lone head', () => {
    expect(renderThread(createThread(head))).toBe(
      '## **U01ALICE:** Anyone around? *[2024-02-01 00:00:00 UTC]*\n\n### Replies\n'
    );
  });
});

describe('renderEntry', () => {
  it('should dispatch on the entry kind', () => {
    const standalone = createMessage('solo', 'U02BOB', T1);

    expect(renderEntry({ kind: 'message', message: standalone }, users)).toBe(
      '**BR:** solo *[2024-02-01 00:01:00 UTC]*'
    );
    expect(renderEntry(thread, users)).toBe(renderThread(thread, users));
  });
});

describe('renderChannelDocument', () => {
  it('should render the timeline with rules after threads', () => {
    const channel = buildChannel('general', [
      createMessage('later', 'U02BOB', T1),
      head,
      createMessage('Sure', 'U02BOB', T2, T0),
    ]);

    expect(renderChannelDocument(channel, users)).toBe(
      '# general channel, in markdown\n\n' +
        '## **AL:** Anyone around? *[2024-02-01 00:00:00 UTC]*\n\n' +
        '### Replies\n' +
        '**BR:** Sure *[2024-02-01 00:02:00 UTC]*\n\n' +
        '---\n\n' +
        '**BR:** later *[2024-02-01 00:01:00 UTC]*\n\n'
    );
  });

  it('should render only the title for an empty channel', () => {
    expect(renderChannelDocument(buildChannel('quiet', []))).toBe('# quiet channel, in markdown\n\n');
  });
});

describe('renderThreadDocument', () => {
  it('should render a thread as its own document', () => {
    expect(renderThreadDocument(createThread(head, [reply2]), users)).toBe(
      '# A thread begins here\n' +
        '**AL:** Anyone around? *[2024-02-01 00:00:00 UTC]*\n\n' +
        '## Replies\n' +
        '**AL:** Great *[2024-02-01 00:01:00 UTC]*'
    );
  });
});

describe('markdown writers', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `slackmd-md-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const channel = buildChannel('general', [
    head,
    reply2,
    createMessage('Separate topic', 'U02BOB', T1, T1),
    createMessage('Noted', 'U01ALICE', T2, T1),
  ]);

  it('should write one file per channel', async () => {
    const result = await writeChannelMarkdown(channel, testDir, { users });

    expect(result.filename).toBe('general.md');
    expect(result.filePath).toBe(join(testDir, 'general.md'));

    const content = await readFile(result.filePath, 'utf-8');
    expect(content).toBe(renderChannelDocument(channel, users));
    expect(result.bytesWritten).toBe(Buffer.byteLength(content, 'utf-8'));
  });

  it('should write one file per thread under the channel directory', async () => {
    const results = await writeThreadMarkdownFiles(channel, testDir, { users });

    expect(results.map((r) => r.filename)).toEqual([`${T0}.md`, `${T1}.md`]);
    expect((await readdir(join(testDir, 'general'))).sort()).toEqual([`${T0}.md`, `${T1}.md`]);

    const content = await readFile(join(testDir, 'general', `${T1}.md`), 'utf-8');
    expect(content).toBe(
      '# A thread begins here\n' +
        '**BR:** Separate topic *[2024-02-01 00:01:00 UTC]*\n\n' +
        '## Replies\n' +
        '**AL:** Noted *[2024-02-01 00:02:00 UTC]*'
    );
  });

  it('should not write anything on a dry run', async () => {
    const result = await writeChannelMarkdown(channel, join(testDir, 'out'), { dryRun: true });

    expect(result.bytesWritten).toBe(0);
    await expect(access(join(testDir, 'out'))).rejects.toThrow();
  });

  it('should write no thread file when a user is unknown', async () => {
    const broken = buildChannel('broken', [
      createMessage('fine', 'U01ALICE', T0, T0),
      createMessage('who?', 'U99NOBODY', T1, T1),
    ]);

    await expect(writeThreadMarkdownFiles(broken, testDir, { users })).rejects.toThrow(
      UnknownUserError
    );
    await expect(access(join(testDir, 'broken'))).rejects.toThrow();
  });
});

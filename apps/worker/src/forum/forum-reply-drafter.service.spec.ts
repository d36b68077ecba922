import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { IsNull } from 'typeorm';
import {
  ForumPersona,
  ForumReply,
  ForumThread,
  GenerationStatus,
  User,
} from '@hairline/database';
import {
  ForumReplyDrafter,
  formatThreadTranscript,
} from './forum-reply-drafter.service';
import { StructuredLlmService } from '../llm/structured-llm.service';

const author = Object.assign(new User(), { fullName: 'Sam' });
const barry = Object.assign(new ForumPersona(), {
  id: 'barry',
  name: 'Blunt Barry',
  systemPrompt: 'You are Barry.',
});
const thread = Object.assign(new ForumThread(), {
  id: 't1',
  title: 'Norwood 2 or 3?',
  content: 'My temples moved.',
  user: author,
});

function reply(content: string, from: { user?: User; persona?: ForumPersona }): ForumReply {
  return Object.assign(new ForumReply(), {
    content,
    user: from.user ?? null,
    persona: from.persona ?? null,
  });
}

describe('formatThreadTranscript', () => {
  it('lists the opening post and replies oldest first', () => {
    const transcript = formatThreadTranscript(thread, [
      reply('Looks like a 2.', { persona: barry }),
      reply('Hope so!', { user: author }),
    ]);

    expect(transcript).toBe(
      [
        'Thread: Norwood 2 or 3?',
        'Sam wrote:',
        'My temples moved.',
        '',
        'Recent replies, oldest first:',
        '[Blunt Barry] Looks like a 2.',
        '[Sam] Hope so!',
      ].join('\n'),
    );
  });

  it('ends with the message being answered', () => {
    const transcript = formatThreadTranscript(
      thread,
      [],
      reply('What about the crown?', { user: author }),
    );

    expect(transcript.split('\n').pop()).toBe(
      'Answer this message directly. [Sam] What about the crown?',
    );
  });
});

describe('ForumReplyDrafter', () => {
  let drafter: ForumReplyDrafter;

  const replyRepository = {
    findOne: jest.fn(),
    find: jest.fn(),
    create: jest.fn((data: Partial<ForumReply>) => ({ ...data })),
    save: jest.fn((row: Partial<ForumReply>) => Promise.resolve({ ...row, id: 'new' })),
    update: jest.fn(),
  };
  const llm = { generateStructured: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        ForumReplyDrafter,
        { provide: getRepositoryToken(ForumReply), useValue: replyRepository },
        { provide: StructuredLlmService, useValue: llm },
      ],
    }).compile();

    drafter = moduleRef.get(ForumReplyDrafter);
  });

  it('reuses the processing reply a failed attempt left behind', async () => {
    const leftover = Object.assign(new ForumReply(), { id: 'leftover' });
    replyRepository.findOne.mockResolvedValue(leftover);

    await expect(drafter.openReply('t1', 'barry', null)).resolves.toBe(leftover);
    expect(replyRepository.findOne).toHaveBeenCalledWith({
      where: {
        threadId: 't1',
        personaId: 'barry',
        parentId: IsNull(),
        status: GenerationStatus.PROCESSING,
      },
    });
    expect(replyRepository.save).not.toHaveBeenCalled();
  });

  it('opens a new processing reply otherwise', async () => {
    replyRepository.findOne.mockResolvedValue(null);

    const opened = await drafter.openReply('t1', 'barry', 'r-user');

    expect(opened).toEqual({
      id: 'new',
      threadId: 't1',
      personaId: 'barry',
      parentId: 'r-user',
      userId: null,
      content: null,
      status: GenerationStatus.PROCESSING,
    });
  });

  it('drafts with the persona prompt and the latest replies in order', async () => {
    replyRepository.find.mockResolvedValue([
      reply('second', { user: author }),
      reply('first', { persona: barry }),
    ]);
    llm.generateStructured.mockResolvedValue({ content: '  Get a dermatologist.  ' });

    const content = await drafter.draft(barry, thread);

    expect(content).toBe('Get a dermatologist.');
    const request = llm.generateStructured.mock.calls[0][0];
    expect(request.systemPrompt.startsWith('You are Barry.\n\n')).toBe(true);
    expect(request.toolName).toBe('forum_reply');
    expect(request.userText).toContain('[Blunt Barry] first\n[Sam] second');
    expect(replyRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({ take: 10, order: { createdAt: 'DESC' } }),
    );
  });
});

import { DataSource } from 'typeorm';
import { scoringEntities } from '../../src/config/database';
import { User } from '../../src/models/User';
import { Post } from '../../src/models/Post';
import { Poll } from '../../src/models/Poll';
import { PollOption } from '../../src/models/PollOption';
import { Clock } from '../../src/types/scoring';

/**
 * In-memory SQLite database with the scoring entities, schema created fresh
 */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'sqljs',
    autoSave: false,
    entities: scoringEntities,
    synchronize: true,
    dropSchema: true,
    logging: false,
  });
  await dataSource.initialize();
  return dataSource;
}

export class FakeClock {
  private current: Date;

  constructor(iso: string) {
    this.current = new Date(iso);
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export async function createUser(
  dataSource: DataSource,
  username: string,
  names: { firstName?: string; lastName?: string } = {}
): Promise<User> {
  const users = dataSource.getRepository(User);
  return users.save(users.create({
    username,
    email: `${username}@example.com`,
    firstName: names.firstName ?? '',
    lastName: names.lastName ?? '',
  }));
}

export async function createPost(dataSource: DataSource, authorId: number, content: string = 'Hello feed'): Promise<Post> {
  const posts = dataSource.getRepository(Post);
  return posts.save(posts.create({ authorId, content }));
}

export async function createPoll(
  dataSource: DataSource,
  postId: number | null,
  optionTexts: string[]
): Promise<{ poll: Poll; options: PollOption[] }> {
  const poll = await dataSource.getRepository(Poll).save(
    dataSource.getRepository(Poll).create({ postId, question: 'Which one?' })
  );
  const optionRepository = dataSource.getRepository(PollOption);
  const options: PollOption[] = [];
  for (const text of optionTexts) {
    options.push(await optionRepository.save(optionRepository.create({ pollId: poll.id, text })));
  }
  return { poll, options };
}

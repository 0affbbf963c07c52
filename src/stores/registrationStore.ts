import { DataSource, FindOptionsWhere } from 'typeorm';
import { WebhookRegistration } from '../entities/WebhookRegistration';

export interface RegistrationInput {
  repositoryId: number;
  remoteHookId: string;
  secret: string;
  url: string;
  events: string[];
}

export interface RegistrationSearch {
  id?: string;
  repositoryId?: number;
  active?: boolean;
  limit: number;
  offset: number;
  orderByDir: 'ASC' | 'DESC';
}

export interface RegistrationStore {
  listActive(): Promise<WebhookRegistration[]>;
  findActiveByRepository(repositoryId: number): Promise<WebhookRegistration | null>;
  // Deactivates any active registration of the repository and stores the new one
  replaceActive(input: RegistrationInput): Promise<WebhookRegistration>;
  search(filters: RegistrationSearch): Promise<{ items: WebhookRegistration[]; total: number }>;
}

export class TypeormRegistrationStore implements RegistrationStore {
  constructor(private readonly dataSource: DataSource) {}

  async listActive(): Promise<WebhookRegistration[]> {
    return this.dataSource.getRepository(WebhookRegistration).find({
      where: { active: true },
      order: { createdAt: 'DESC' },
    });
  }

  async findActiveByRepository(repositoryId: number): Promise<WebhookRegistration | null> {
    return this.dataSource.getRepository(WebhookRegistration).findOne({ where: { repositoryId, active: true } });
  }

  async replaceActive(input: RegistrationInput): Promise<WebhookRegistration> {
    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(WebhookRegistration);
      await repo.update({ repositoryId: input.repositoryId, active: true }, { active: false });
      return repo.save(repo.create({ ...input, active: true }));
    });
  }

  async search(filters: RegistrationSearch): Promise<{ items: WebhookRegistration[]; total: number }> {
    const where: FindOptionsWhere<WebhookRegistration> = {};
    if (filters.id !== undefined) where.id = filters.id;
    if (filters.repositoryId !== undefined) where.repositoryId = filters.repositoryId;
    if (filters.active !== undefined) where.active = filters.active;
    const [items, total] = await this.dataSource.getRepository(WebhookRegistration).findAndCount({
      where,
      take: filters.limit,
      skip: filters.offset,
      order: { createdAt: filters.orderByDir },
    });
    return { items, total };
  }
}

import { DataSource } from 'typeorm';
import { AccountType, Installation } from '../entities/Installation';

export interface InstallationInput {
  installationId: number;
  accountId: number;
  accountLogin: string;
  accountType: AccountType;
  suspendedAt?: Date | null;
  permissions?: Record<string, string> | null;
  events?: string[] | null;
}

// Account <-> installation identity; written by installation lifecycle events and syncs
export interface InstallationDirectory {
  findByAccountLogin(accountLogin: string): Promise<Installation | null>;
  findByInstallationId(installationId: number): Promise<Installation | null>;
  list(): Promise<Installation[]>;
  upsert(input: InstallationInput): Promise<Installation>;
  delete(installationId: number): Promise<boolean>;
}

export class TypeormInstallationDirectory implements InstallationDirectory {
  constructor(private readonly dataSource: DataSource) {}

  async findByAccountLogin(accountLogin: string): Promise<Installation | null> {
    return this.dataSource.getRepository(Installation).findOne({
      where: { accountLogin },
      order: { updatedAt: 'DESC' },
    });
  }

  async findByInstallationId(installationId: number): Promise<Installation | null> {
    return this.dataSource.getRepository(Installation).findOne({ where: { installationId } });
  }

  async list(): Promise<Installation[]> {
    return this.dataSource.getRepository(Installation).find({ order: { accountLogin: 'ASC' } });
  }

  // Keyed by installationId so redelivered "created" events never duplicate a record
  async upsert(input: InstallationInput): Promise<Installation> {
    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(Installation);
      const existing = await repo.findOne({ where: { installationId: input.installationId } });
      const record = existing ?? repo.create({ installationId: input.installationId });
      record.accountId = input.accountId;
      record.accountLogin = input.accountLogin;
      record.accountType = input.accountType;
      record.suspendedAt = input.suspendedAt ?? null;
      if (input.permissions !== undefined) record.permissions = input.permissions;
      if (input.events !== undefined) record.events = input.events;
      return repo.save(record);
    });
  }

  async delete(installationId: number): Promise<boolean> {
    return this.dataSource.transaction(async (manager) => {
      const result = await manager.getRepository(Installation).delete({ installationId });
      return (result.affected ?? 0) > 0;
    });
  }
}

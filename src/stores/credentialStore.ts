import { DataSource } from 'typeorm';
import { StoredCredential } from '../entities/StoredCredential';

export interface CredentialStore {
  findLatestByAccountLogin(accountLogin: string): Promise<StoredCredential | null>;
}

export class TypeormCredentialStore implements CredentialStore {
  constructor(private readonly dataSource: DataSource) {}

  async findLatestByAccountLogin(accountLogin: string): Promise<StoredCredential | null> {
    return this.dataSource.getRepository(StoredCredential).findOne({
      where: { accountLogin },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }
}

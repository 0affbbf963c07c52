import { DataSource } from 'typeorm';
import { Repository } from '../entities/Repository';

// Read side of the repository-selection service's table
export interface RepositoryStore {
  findById(id: number): Promise<Repository | null>;
}

export class TypeormRepositoryStore implements RepositoryStore {
  constructor(private readonly dataSource: DataSource) {}

  async findById(id: number): Promise<Repository | null> {
    return this.dataSource.getRepository(Repository).findOne({ where: { id } });
  }
}

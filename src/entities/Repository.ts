import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { bigintToNumber } from './columns';

// Repository selected for runners (written by the repository-selection service)
@Entity()
@Index(['ownerLogin', 'name'], { unique: true })
export class Repository {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column({ type: 'bigint', transformer: bigintToNumber })
  githubRepoId!: number;

  @Column({ type: 'varchar' })
  ownerLogin!: string;

  @Column({ type: 'varchar' })
  name!: string;

  @Column({ type: 'varchar' })
  fullName!: string;

  @Column({ type: 'varchar', default: 'main' })
  defaultBranch!: string;

  @CreateDateColumn()
  createdAt!: Date;
}

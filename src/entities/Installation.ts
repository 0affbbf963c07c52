import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { bigintToNumber, timestampType } from './columns';

export type AccountType = 'User' | 'Organization';

// GitHub App installation on a user or organization account
@Entity()
export class Installation {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column({ type: 'bigint', transformer: bigintToNumber })
  installationId!: number;

  @Index()
  @Column({ type: 'bigint', transformer: bigintToNumber })
  accountId!: number;

  // Join key from a repository owner
  @Index()
  @Column({ type: 'varchar' })
  accountLogin!: string;

  @Column({ type: 'varchar' })
  accountType!: AccountType;

  @Column({ type: timestampType, nullable: true })
  suspendedAt!: Date | null;

  @Column({ type: 'simple-json', nullable: true })
  permissions!: Record<string, string> | null;

  @Column({ type: 'simple-json', nullable: true })
  events!: string[] | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}

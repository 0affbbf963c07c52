import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

// User/account token kept by the login flow; fallback when no installation exists
@Entity()
export class StoredCredential {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar' })
  accountLogin!: string;

  @Column({ type: 'text' })
  token!: string;

  @Column({ type: 'varchar', default: 'oauth' })
  tokenType!: string;

  @Column({ type: 'varchar', nullable: true })
  scopes!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}

import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

@Entity()
@Index(['repositoryId', 'remoteHookId'], { unique: true })
export class WebhookRegistration {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'integer' })
  repositoryId!: number;

  // GitHub hook id, or a local-dev placeholder
  @Column({ type: 'varchar' })
  remoteHookId!: string;

  // Shared HMAC secret; only the signature verifier reads it
  @Column({ type: 'varchar' })
  secret!: string;

  @Column({ type: 'varchar' })
  url!: string;

  @Column({ type: 'simple-json' })
  events!: string[];

  @Column({ type: 'boolean', default: true })
  active!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}

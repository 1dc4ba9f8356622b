import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';

@Entity('comments')
@Index(['page', 'parentId', 'isDeleted'])
@Index(['page', 'createdAt'])
@Index(['parentId', 'createdAt'])
@Index(['email', 'ipAddress'])
export class Comment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200 })
  page!: string;

  @Column({ type: 'varchar', length: 255 })
  email!: string;

  // md5 of the trimmed, lower-cased email (Gravatar key)
  @Column({ type: 'varchar', length: 32 })
  emailHash!: string;

  @Column({ type: 'varchar', length: 100 })
  username!: string;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'int', nullable: true })
  parentId!: number | null;

  @ManyToOne(() => Comment, { nullable: true })
  @JoinColumn({ name: 'parentId' })
  parent?: Comment | null;

  @Column({ type: 'boolean', default: false })
  isDeleted!: boolean;

  // Millisecond precision keeps cursor values equal to what JS Dates can hold.
  @CreateDateColumn({ type: 'timestamptz', precision: 3 })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', precision: 3 })
  updatedAt!: Date;

  @Column({ type: 'varchar', length: 45, nullable: true })
  ipAddress!: string | null;

  @Column({ type: 'text', nullable: true })
  userAgent!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  systemType!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  location!: string | null;
}

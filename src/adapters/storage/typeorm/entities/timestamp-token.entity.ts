import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { ScanRecordEntity } from './scan-record.entity';

/**
 * TypeORM entity for TimestampToken.
 * `correlation_id` references scan_records, so a token cannot precede its record.
 */
@Entity('timestamp_tokens')
@Index(['correlationId'], { unique: true })
export class TimestampTokenEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'correlation_id', type: 'varchar', length: 128 })
  correlationId!: string;

  @ManyToOne(() => ScanRecordEntity, { onDelete: 'RESTRICT', nullable: false })
  @JoinColumn({ name: 'correlation_id', referencedColumnName: 'correlationId' })
  scanRecord?: ScanRecordEntity;

  @Column({ type: 'bytea' })
  token!: Buffer;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}

import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

/**
 * TypeORM entity for ScanRecord
 */
@Entity('scan_records')
@Index(['correlationId'], { unique: true })
@Index(['createdAt'])
export class ScanRecordEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'correlation_id', type: 'varchar', length: 128 })
  correlationId!: string;

  @Column({ type: 'bytea' })
  payload!: Buffer;

  @Column({ type: 'varchar', length: 255, nullable: true })
  probe!: string | null;

  @Column({ name: 'scanned_at', type: 'timestamptz', nullable: true })
  scannedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}

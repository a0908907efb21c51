import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Relation,
} from 'typeorm';
import {
  MAX_CODE_LENGTH,
  VALUE_PRECISION,
  ReadingType,
  VALUE_SCALE,
} from '../../ingestion/d0010/field-validators';
import { decimalTransformer } from '../decimal.transformer';
import { FlowFile } from './flow-file.entity';
import { Meter } from './meter.entity';

/**
 * Reading Entity
 *
 * One register reading from a 030 record. Readings are not deduplicated:
 * the same (meter, register, datetime) arriving in two files is stored
 * twice, each row tagged with the file it came from.
 */
@Entity('readings')
@Index('idx_readings_meter_reading_at', ['meterId', 'readingAt'])
export class Reading {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  meterId!: number;

  @ManyToOne(() => Meter, (meter) => meter.readings, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'meterId' })
  meter!: Relation<Meter>;

  @Column({ type: 'integer' })
  @Index('idx_readings_flow_file')
  flowFileId!: number;

  @ManyToOne(() => FlowFile, (flowFile) => flowFile.readings, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'flowFileId' })
  flowFile!: Relation<FlowFile>;

  /** Register id, e.g. 'S', 'DY', 'NT', '01' */
  @Column({ type: 'varchar', length: MAX_CODE_LENGTH })
  registerId!: string;

  /** Non-negative register value */
  @Column({
    type: 'decimal',
    precision: VALUE_PRECISION,
    scale: VALUE_SCALE,
    transformer: decimalTransformer,
  })
  value!: number;

  /** Instant of the reading (source value is UK civil time) */
  @Column()
  readingAt!: Date;

  @Column({ type: 'varchar', length: 16, default: 'ACTUAL' })
  readingType!: ReadingType;
}

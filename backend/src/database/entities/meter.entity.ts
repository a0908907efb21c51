import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  Relation,
  Unique,
} from 'typeorm';
import {
  MAX_CODE_LENGTH,
  MAX_SERIAL_LENGTH,
} from '../../ingestion/d0010/field-validators';
import { MeterPoint } from './meter-point.entity';
import { Reading } from './reading.entity';

/**
 * Meter Entity
 *
 * A physical meter installed at one meter point. The same serial number may
 * exist under two different meter points, so uniqueness is per pair.
 */
@Entity('meters')
@Unique('uq_meters_meter_point_serial', ['meterPointId', 'serialNumber'])
export class Meter {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: MAX_SERIAL_LENGTH })
  serialNumber!: string;

  /**
   * Meter type code from the 028 record: 'D' | 'C' | 'P', an unrecognized
   * code kept verbatim, or null when the record carried none.
   */
  @Column({ type: 'varchar', length: MAX_CODE_LENGTH, nullable: true })
  meterType!: string | null;

  @Column({ type: 'integer' })
  meterPointId!: number;

  @ManyToOne(() => MeterPoint, (meterPoint) => meterPoint.meters, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'meterPointId' })
  meterPoint!: Relation<MeterPoint>;

  @OneToMany(() => Reading, (reading) => reading.meter)
  readings!: Relation<Reading[]>;

  @CreateDateColumn()
  createdAt!: Date;
}

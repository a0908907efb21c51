import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
  Relation,
} from 'typeorm';
import { Meter } from './meter.entity';

/**
 * MeterPoint Entity
 *
 * A consumption point, identified by its 13-digit MPAN. Shared across flow
 * files: created on the first 026 record that names it, looked up after.
 */
@Entity('meter_points')
export class MeterPoint {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 13, unique: true })
  mpan!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @OneToMany(() => Meter, (meter) => meter.meterPoint)
  meters!: Relation<Meter[]>;
}

import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
  Relation,
} from 'typeorm';
import { Reading } from './reading.entity';

export const MAX_FILENAME_LENGTH = 255;

/**
 * FlowFile Entity
 *
 * One imported D0010 file. The unique filename is what rejects a second
 * import of the same file, including one racing in from another process.
 *
 * Row counts are written in the same transaction that inserts the row, so
 * a committed FlowFile always carries its final counts.
 */
@Entity('flow_files')
export class FlowFile {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: MAX_FILENAME_LENGTH, unique: true })
  filename!: string;

  @CreateDateColumn()
  importedAt!: Date;

  /** Non-blank lines read from the file */
  @Column({ type: 'integer', default: 0 })
  lineCount!: number;

  @Column({ type: 'integer', default: 0 })
  readingCount!: number;

  /** Lines rejected with a recoverable error */
  @Column({ type: 'integer', default: 0 })
  skippedCount!: number;

  @OneToMany(() => Reading, (reading) => reading.flowFile)
  readings!: Relation<Reading[]>;
}

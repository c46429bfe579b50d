import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * One closed work session. `valid` is false for sessions closed by the
 * disqualification sweep; those stay for audit but never count toward a balance.
 */
@Entity('entries')
@Index(['uid', 'fromUnixS'])
export class Entry {
  @PrimaryGeneratedColumn({ name: 'eid' })
  eid!: number;

  @Column({ name: 'uid', type: 'integer' })
  uid!: number;

  @Column({ name: 'from_unix_s', type: 'integer' })
  fromUnixS!: number;

  @Column({ name: 'to_unix_s', type: 'integer' })
  toUnixS!: number;

  @Column({ name: 'valid', type: 'boolean', default: true })
  valid!: boolean;
}

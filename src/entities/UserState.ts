import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

// 'I' = clocked in, 'O' = clocked out
export type ClockState = 'I' | 'O';

@Entity('user_states')
@Index(['state'])
export class UserState {
  @PrimaryColumn({ name: 'uid', type: 'integer' })
  uid!: number;

  @Column({ name: 'state', type: 'varchar', length: 1, default: 'O' })
  state!: ClockState;

  // Moment of the most recent transition, Unix seconds
  @Column({ name: 'since_unix_s', type: 'integer' })
  sinceUnixS!: number;
}

import { BeforeInsert, PrimaryColumn } from 'typeorm';
import { monotonicFactory } from 'ulid';

const nextUlid = monotonicFactory();

/**
 * Base class for every table: a 26-character ULID primary key assigned
 * just before insert. Ids from one process sort in insertion order, even
 * within the same millisecond.
 */
export abstract class UlidEntity {
  @PrimaryColumn({ type: 'varchar', length: 26 })
  id!: string;

  @BeforeInsert()
  protected assignId(): void {
    if (!this.id) {
      this.id = nextUlid();
    }
  }
}

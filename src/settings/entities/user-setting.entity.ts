import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  UpdateDateColumn,
} from "typeorm";

/**
 * User Setting Entity
 *
 * Key/value store with upsert semantics on `settingKey`.
 */
@Entity("user_settings")
export class UserSetting {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 100, unique: true })
  settingKey!: string;

  @Column({ type: "text", nullable: true })
  settingValue!: string | null;

  @UpdateDateColumn({ type: "timestamptz" })
  lastUpdated!: Date;
}

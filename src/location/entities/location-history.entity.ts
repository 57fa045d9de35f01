import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from "typeorm";

/**
 * Location History Entity
 *
 * Append-only log of geocoded lookups. Rows are only ever removed by a
 * bulk clear.
 */
@Entity("location_history")
export class LocationHistory {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 255 })
  query!: string;

  @Column({ type: "varchar", length: 255, nullable: true })
  resolvedName!: string | null;

  @Column({ type: "double precision", nullable: true })
  latitude!: number | null;

  @Column({ type: "double precision", nullable: true })
  longitude!: number | null;

  @Index()
  @CreateDateColumn({ type: "timestamptz" })
  timestamp!: Date;
}

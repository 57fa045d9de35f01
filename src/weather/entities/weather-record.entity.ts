import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from "typeorm";
import { LocationType } from "../../location/location.types";

/**
 * Weather Record Entity
 *
 * One row per successful current-weather fetch or per forecast day.
 *
 * Location identity is the exact `locationName` string (the normalized
 * query), not a geocoded key: "New York,Us" and "10001" are different
 * locations here even though they resolve to the same coordinates.
 */
@Entity("weather_records")
@Index(["locationName", "timestamp"])
export class WeatherRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 255 })
  locationName!: string;

  /**
   * zip | coordinates | city | landmark
   * Null for records written before the query was classified.
   */
  @Column({ type: "varchar", length: 20, nullable: true })
  locationType!: LocationType | null;

  // Name reported by the provider, e.g. "New York" for "10001"
  @Column({ type: "varchar", length: 255, nullable: true })
  resolvedName!: string | null;

  @Column({ type: "double precision" })
  latitude!: number;

  @Column({ type: "double precision" })
  longitude!: number;

  // Observation time (current) or fetch time (forecast days)
  @Column({ type: "timestamptz" })
  timestamp!: Date;

  // Temperature (°C)
  @Column({ type: "double precision", nullable: true })
  temperature!: number | null;

  @Column({ type: "double precision", nullable: true })
  feelsLike!: number | null;

  // Relative humidity (%)
  @Column({ type: "int", nullable: true })
  humidity!: number | null;

  // Wind (m/s)
  @Column({ type: "double precision", nullable: true })
  windSpeed!: number | null;

  @Column({ type: "varchar", length: 255, nullable: true })
  condition!: string | null;

  @Column({ type: "date", nullable: true })
  dateRangeStart!: string | null; // YYYY-MM-DD

  @Column({ type: "date", nullable: true })
  dateRangeEnd!: string | null;

  @CreateDateColumn({ type: "timestamptz" })
  createdAt!: Date;

  @UpdateDateColumn({ type: "timestamptz" })
  updatedAt!: Date;
}

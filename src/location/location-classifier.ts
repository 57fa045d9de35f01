import { Injectable } from "@nestjs/common";
import { ValidationError } from "../common/errors/api-errors";
import {
  ClassificationResult,
  LocationDisplay,
  LocationQuery,
  LocationType,
} from "./location.types";

/**
 * Pattern families, checked in this order. The first match wins, so a
 * string like "12345" is a ZIP even though it would also pass as a landmark.
 */
const LOCATION_PATTERNS: ReadonlyArray<[LocationType, RegExp]> = [
  ["zip", /^\d{5}(-\d{4})?$/],
  ["coordinates", /^-?\d+(\.\d+)?,\s*-?\d+(\.\d+)?$/],
  ["city", /^[A-Za-z\s]{2,},\s*[A-Za-z]{2,}$/],
  ["landmark", /^[A-Za-z0-9\s\-'.]{2,}$/],
];

const LANDMARK_MAX_LENGTH = 100;
const LANDMARK_MAX_WORDS = 10;
// Letters and digits of any script, plus a little punctuation
const LANDMARK_DISALLOWED = /[^\p{L}\p{N}_\s\-'.,:()]/u;

const NUMBER_PATTERN = /-?\d+(\.\d+)?/g;

function titleCase(text: string): string {
  return text.replace(
    /[A-Za-z]+/g,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Classifies free-form location input as zip, coordinates, city or landmark
 * and canonicalizes it for lookups and display.
 */
@Injectable()
export class LocationClassifier {
  classify(input: unknown): ClassificationResult {
    if (typeof input !== "string" || input.length === 0) {
      return {
        valid: false,
        message: "Location must be a non-empty string",
        type: null,
      };
    }

    const location = input.trim();
    if (location.length < 2) {
      return {
        valid: false,
        message: "Location must be at least 2 characters long",
        type: null,
      };
    }

    for (const [type, pattern] of LOCATION_PATTERNS) {
      if (pattern.test(location)) {
        return { valid: true, message: "Valid location format", type };
      }
    }

    if (this.isReasonableLandmark(location)) {
      return {
        valid: true,
        message: "Assumed landmark location",
        type: "landmark",
      };
    }

    return { valid: false, message: "Invalid location format", type: null };
  }

  /**
   * Classify and normalize in one step
   *
   * @throws ValidationError with the classification message
   */
  toQuery(input: unknown): LocationQuery {
    const result = this.classify(input);
    if (!result.valid || result.type === null || typeof input !== "string") {
      throw new ValidationError(result.message, {
        location: typeof input === "string" ? input : null,
      });
    }

    return {
      raw: input,
      type: result.type,
      normalized: this.normalize(input, result.type),
    };
  }

  normalize(input: string, type: LocationType): string {
    const location = input.trim();

    switch (type) {
      case "coordinates": {
        const numbers = this.extractNumbers(location);
        if (!numbers) {
          return location;
        }
        const [lat, lon] = numbers;
        return `${lat.toFixed(6)},${lon.toFixed(6)}`;
      }
      case "city":
        return location
          .split(",")
          .map((part) => titleCase(part.trim()))
          .join(",");
      case "zip":
        return location.replace(/ /g, "");
      case "landmark":
        return location
          .split(/\s+/)
          .map((word) => (word.length > 3 ? capitalize(word) : word))
          .join(" ");
    }
  }

  formatForDisplay(input: string, type: LocationType): LocationDisplay {
    const normalized = this.normalize(input, type);
    const display: LocationDisplay = {
      original: input,
      normalized,
      type,
      displayName: normalized,
    };

    if (type === "coordinates") {
      const numbers = this.extractNumbers(normalized);
      if (numbers) {
        const [latitude, longitude] = numbers;
        display.latitude = latitude;
        display.longitude = longitude;
        display.displayName = `(${latitude.toFixed(4)}, ${longitude.toFixed(4)})`;
      }
    }

    return display;
  }

  /**
   * The two numbers of a coordinate string, or null if it holds fewer or more
   */
  extractNumbers(location: string): [number, number] | null {
    const matches = location.match(NUMBER_PATTERN);
    if (!matches || matches.length !== 2) {
      return null;
    }
    return [parseFloat(matches[0]), parseFloat(matches[1])];
  }

  private isReasonableLandmark(location: string): boolean {
    if (location.length > LANDMARK_MAX_LENGTH) {
      return false;
    }
    if (LANDMARK_DISALLOWED.test(location)) {
      return false;
    }
    return location.split(/\s+/).length <= LANDMARK_MAX_WORDS;
  }
}

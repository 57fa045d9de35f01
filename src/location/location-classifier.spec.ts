import { ValidationError } from "../common/errors/api-errors";
import { LocationClassifier } from "./location-classifier";

describe("LocationClassifier", () => {
  let classifier: LocationClassifier;

  beforeEach(() => {
    classifier = new LocationClassifier();
  });

  describe("classify", () => {
    it.each([
      ["10001", "zip"],
      ["12345-6789", "zip"],
      ["40.7128, -74.0060", "coordinates"],
      ["-33.8688,151.2093", "coordinates"],
      ["London, UK", "city"],
      ["new york, us", "city"],
      ["Eiffel Tower", "landmark"],
      ["St. Mary's Church", "landmark"],
    ])("classifies %p as %s", (input, type) => {
      expect(classifier.classify(input)).toEqual({
        valid: true,
        message: "Valid location format",
        type,
      });
    });

    it("should prefer zip over landmark for five digits", () => {
      expect(classifier.classify("12345").type).toBe("zip");
    });

    it("should classify out-of-range coordinates by shape only", () => {
      expect(classifier.classify("91, 200").type).toBe("coordinates");
    });

    it("should fall back to an assumed landmark for non-ASCII names", () => {
      expect(classifier.classify("Zürich Hauptbahnhof")).toEqual({
        valid: true,
        message: "Assumed landmark location",
        type: "landmark",
      });
    });

    it("should accept parentheses and colons in the landmark fallback", () => {
      expect(classifier.classify("Mt. Fuji (Japan)").message).toBe(
        "Assumed landmark location",
      );
    });

    it.each([[""], [42], [null], [undefined]])(
      "rejects %p as not a non-empty string",
      (input) => {
        expect(classifier.classify(input)).toEqual({
          valid: false,
          message: "Location must be a non-empty string",
          type: null,
        });
      },
    );

    it("should reject input shorter than 2 characters after trimming", () => {
      expect(classifier.classify("  a ")).toEqual({
        valid: false,
        message: "Location must be at least 2 characters long",
        type: null,
      });
    });

    it("should reject disallowed characters", () => {
      expect(classifier.classify("hello@world!")).toEqual({
        valid: false,
        message: "Invalid location format",
        type: null,
      });
    });

    it("should reject fallback candidates longer than 100 characters", () => {
      expect(classifier.classify("é".repeat(101)).valid).toBe(false);
    });

    it("should reject fallback candidates with more than 10 words", () => {
      expect(classifier.classify("ä b c d e f g h i j k").valid).toBe(false);
    });
  });

  describe("normalize", () => {
    it("should format coordinates with 6 decimals", () => {
      expect(classifier.normalize("40.7128, -74.0060", "coordinates")).toBe(
        "40.712800,-74.006000",
      );
    });

    it("should title-case city segments and drop spaces around commas", () => {
      expect(classifier.normalize("  new york ,  us ", "city")).toBe(
        "New York,Us",
      );
    });

    it("should remove spaces from zip codes", () => {
      expect(classifier.normalize("100 01", "zip")).toBe("10001");
    });

    it("should capitalize landmark words longer than 3 characters", () => {
      expect(classifier.normalize("statue of LIBERTY", "landmark")).toBe(
        "Statue of Liberty",
      );
    });
  });

  describe("formatForDisplay", () => {
    it("should add parsed coordinates and a 4-decimal display name", () => {
      expect(
        classifier.formatForDisplay("40.7128, -74.0060", "coordinates"),
      ).toEqual({
        original: "40.7128, -74.0060",
        normalized: "40.712800,-74.006000",
        type: "coordinates",
        displayName: "(40.7128, -74.0060)",
        latitude: 40.7128,
        longitude: -74.006,
      });
    });

    it("should use the normalized string as display name for cities", () => {
      expect(classifier.formatForDisplay("paris, fr", "city")).toEqual({
        original: "paris, fr",
        normalized: "Paris,Fr",
        type: "city",
        displayName: "Paris,Fr",
      });
    });
  });

  describe("toQuery", () => {
    it("should return the classified and normalized query", () => {
      expect(classifier.toQuery(" 10001 ")).toEqual({
        raw: " 10001 ",
        type: "zip",
        normalized: "10001",
      });
    });

    it("should throw a ValidationError carrying the classification message", () => {
      expect(() => classifier.toQuery("x")).toThrow(ValidationError);
      expect(() => classifier.toQuery("x")).toThrow(
        "Location must be at least 2 characters long",
      );
    });
  });

  describe("extractNumbers", () => {
    it("should return null unless exactly two numbers are present", () => {
      expect(classifier.extractNumbers("1,2,3")).toBeNull();
      expect(classifier.extractNumbers("abc")).toBeNull();
      expect(classifier.extractNumbers("-1.5, 2")).toEqual([-1.5, 2]);
    });
  });
});

import { Inject, Injectable, Optional } from "@nestjs/common";
import { format } from "date-fns";
import PDFDocument from "pdfkit";
import { ValidationError } from "../../common/errors/api-errors";
import { CLOCK, Clock, systemClock } from "../../common/utils/clock";
import { WeatherRecordDto } from "../dto/weather-record.dto";
import { CurrentWeather, DailyForecast } from "../weather.types";

export const REPORT_FORMATS = ["json", "csv", "pdf"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const RECORD_EXPORT_FORMATS = ["json", "csv"] as const;
export type RecordExportFormat = (typeof RECORD_EXPORT_FORMATS)[number];

export interface ExportedFile {
  filename: string;
  contentType: string;
  content: string | Buffer;
}

export interface WeatherReport {
  location: string;
  current: CurrentWeather;
  forecast: DailyForecast[];
}

const RECORD_CSV_HEADER = [
  "ID",
  "Location",
  "Type",
  "Start Date",
  "End Date",
  "Temperature",
  "Conditions",
  "Created At",
  "Updated At",
];

type CsvCell = string | number | null;

function csvCell(value: CsvCell): string {
  const text = value === null ? "" : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function toCsv(rows: CsvCell[][]): string {
  return rows.map((row) => row.map(csvCell).join(",")).join("\n") + "\n";
}

function percent(probability: number): string {
  return `${Math.round(probability * 100)}%`;
}

function celsius(value: number | null): string {
  return value === null ? "" : `${value}°C`;
}

/**
 * Weather Export Service
 *
 * Renders a weather report (current conditions + daily forecast) as JSON,
 * CSV or PDF, and stored records as JSON or CSV.
 */
@Injectable()
export class WeatherExportService {
  constructor(
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {}

  async exportReport(
    report: WeatherReport,
    exportFormat: string,
  ): Promise<ExportedFile> {
    switch (exportFormat) {
      case "json":
        return {
          filename: "weather_report.json",
          contentType: "application/json",
          content: this.toJson(report),
        };
      case "csv":
        return {
          filename: "weather_report.csv",
          contentType: "text/csv; charset=utf-8",
          content: this.toCsv(report),
        };
      case "pdf":
        return {
          filename: "weather_report.pdf",
          contentType: "application/pdf",
          content: await this.toPdf(report),
        };
      default:
        throw new ValidationError("Unsupported export format", {
          format: exportFormat,
          supported: [...REPORT_FORMATS],
        });
    }
  }

  exportRecords(records: WeatherRecordDto[], exportFormat: string): ExportedFile {
    switch (exportFormat) {
      case "json":
        return {
          filename: "weather_data.json",
          contentType: "application/json",
          content: this.recordsToJson(records),
        };
      case "csv":
        return {
          filename: "weather_data.csv",
          contentType: "text/csv; charset=utf-8",
          content: this.recordsToCsv(records),
        };
      default:
        throw new ValidationError("Unsupported export format", {
          format: exportFormat,
          supported: [...RECORD_EXPORT_FORMATS],
        });
    }
  }

  toJson({ location, current, forecast }: WeatherReport): string {
    const data = {
      location,
      exported_at: this.clock().toISOString(),
      current_weather: {
        temperature: current.temperature,
        feels_like: current.feelsLike,
        humidity: current.humidity,
        wind_speed: current.windSpeed,
        condition: current.condition,
        timestamp: current.timestamp,
      },
      forecast: forecast.map((day) => ({
        date: day.date,
        temp_min: day.tempMin,
        temp_max: day.tempMax,
        condition: day.condition,
        precipitation_prob: day.precipitationProb,
      })),
    };
    return JSON.stringify(data, null, 2);
  }

  toCsv({ location, current, forecast }: WeatherReport): string {
    const rows: CsvCell[][] = [
      ["Location:", location],
      ["Exported:", this.clock().toISOString()],
      [],
      ["Current Weather"],
      ["Temperature:", celsius(current.temperature)],
      ["Feels Like:", celsius(current.feelsLike)],
      ["Humidity:", current.humidity === null ? "" : `${current.humidity}%`],
      ["Wind Speed:", current.windSpeed === null ? "" : `${current.windSpeed} m/s`],
      ["Condition:", current.condition],
      ["Timestamp:", current.timestamp],
      [],
      ["5-Day Forecast"],
      ["Date", "Min Temp", "Max Temp", "Condition", "Precipitation Probability"],
      ...forecast.map((day) => [
        day.date,
        celsius(day.tempMin),
        celsius(day.tempMax),
        day.condition,
        percent(day.precipitationProb),
      ]),
    ];
    return toCsv(rows);
  }

  /**
   * Letter-sized report: title, generation time, current conditions table
   * and forecast table
   */
  toPdf({ location, current, forecast }: WeatherReport): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const doc = new PDFDocument({ size: "LETTER", margin: 50 });
      const chunks: Buffer[] = [];

      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(chunks)));
      doc.on("error", reject);

      doc.font("Helvetica-Bold").fontSize(20).text(`Weather Report - ${location}`);
      doc
        .font("Helvetica")
        .fontSize(10)
        .text(`Generated: ${format(this.clock(), "yyyy-MM-dd HH:mm")}`);
      doc.moveDown();

      this.drawTable(
        doc,
        [
          ["Current Weather", ""],
          ["Temperature", celsius(current.temperature)],
          ["Feels Like", celsius(current.feelsLike)],
          ["Humidity", current.humidity === null ? "" : `${current.humidity}%`],
          ["Wind Speed", current.windSpeed === null ? "" : `${current.windSpeed} m/s`],
          ["Condition", current.condition],
          ["Timestamp", format(new Date(current.timestamp), "yyyy-MM-dd HH:mm")],
        ],
        [200, 300],
      );

      doc.font("Helvetica-Bold").fontSize(16).text("5-Day Forecast");
      doc.moveDown(0.5);

      this.drawTable(
        doc,
        [
          ["Date", "Min Temp", "Max Temp", "Condition", "Precipitation"],
          ...forecast.map((day) => [
            day.date,
            celsius(day.tempMin),
            celsius(day.tempMax),
            day.condition,
            percent(day.precipitationProb),
          ]),
        ],
        [100, 80, 80, 160, 80],
      );

      doc.end();
    });
  }

  recordsToJson(records: WeatherRecordDto[]): string {
    return JSON.stringify(records, null, 2);
  }

  recordsToCsv(records: WeatherRecordDto[]): string {
    return toCsv([
      RECORD_CSV_HEADER,
      ...records.map((record) => [
        record.id,
        record.locationName,
        record.locationType,
        record.dateRangeStart,
        record.dateRangeEnd,
        record.temperature,
        record.condition,
        record.createdAt,
        record.updatedAt,
      ]),
    ]);
  }

  /**
   * Grid table with a grey header row
   */
  private drawTable(
    doc: PDFKit.PDFDocument,
    rows: string[][],
    columnWidths: number[],
  ): void {
    const rowHeight = 20;
    const left = doc.page.margins.left;
    const tableWidth = columnWidths.reduce((sum, width) => sum + width, 0);
    let y = doc.y;

    rows.forEach((row, rowIndex) => {
      const isHeader = rowIndex === 0;
      if (isHeader) {
        doc.rect(left, y, tableWidth, rowHeight).fill("#808080");
      }

      let x = left;
      columnWidths.forEach((width, columnIndex) => {
        doc.rect(x, y, width, rowHeight).lineWidth(1).stroke("#000000");
        doc
          .fillColor(isHeader ? "#f5f5f5" : "#000000")
          .font(isHeader ? "Helvetica-Bold" : "Helvetica")
          .fontSize(10)
          .text(row[columnIndex] ?? "", x + 4, y + 6, {
            width: width - 8,
            lineBreak: false,
          });
        x += width;
      });
      y += rowHeight;
    });

    doc.fillColor("#000000");
    doc.x = left;
    doc.y = y + 20;
  }
}

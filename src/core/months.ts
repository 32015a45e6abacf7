import dayjs from "dayjs";
import { InvalidArgumentError } from "./errors";

export function monthName(month: number): string {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidArgumentError("month", `month must be an integer from 1 to 12 (got ${month}).`);
  }
  return dayjs(new Date(2000, month - 1, 1)).format("MMMM");
}

export function currentMonth(now: Date = new Date()): number {
  return dayjs(now).month() + 1;
}

export function nextMonth(now: Date = new Date()): number {
  return (currentMonth(now) % 12) + 1;
}

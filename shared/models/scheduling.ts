import { sql } from "drizzle-orm";
import { z } from "zod";
import { check, index, integer, pgTable, serial, timestamp, uniqueIndex, varchar } from "drizzle-orm/pg-core";
import { users } from "./users";

// Fitness classes - date_time holds the absolute start instant
export const fitnessClasses = pgTable("classes", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 150 }).notNull(),
  instructor: varchar("instructor", { length: 100 }).notNull(),
  startsAt: timestamp("date_time", { withTimezone: true }).notNull(),
  totalSlots: integer("total_slots").notNull(),
  availableSlots: integer("available_slots").notNull(),
  createdBy: integer("created_by").references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("classes_date_time_idx").on(table.startsAt),
  check("classes_total_slots_positive", sql`${table.totalSlots} > 0`),
  check("classes_available_slots_range", sql`${table.availableSlots} >= 0 AND ${table.availableSlots} <= ${table.totalSlots}`),
]);

// Bookings - one row per reserved slot, immutable once written
export const bookings = pgTable("bookings", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  classId: integer("class_id").notNull().references(() => fitnessClasses.id, { onDelete: "cascade" }),
  clientName: varchar("client_name", { length: 100 }).notNull(),
  clientEmail: varchar("client_email", { length: 255 }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("bookings_user_id_idx").on(table.userId),
  uniqueIndex("uq_booking_user_class").on(table.userId, table.classId),
]);

export type FitnessClass = typeof fitnessClasses.$inferSelect;
export type InsertFitnessClass = typeof fitnessClasses.$inferInsert;
export type Booking = typeof bookings.$inferSelect;
export type InsertBooking = typeof bookings.$inferInsert;

// Request bodies keep the field names of the public API
export const createClassSchema = z.object({
  name: z.string().trim().min(1, "Class name is required").max(150),
  dateTime: z.string().trim().min(1, "dateTime is required"),
  instructor: z.string().trim().min(1, "Instructor is required").max(100),
  availableSlots: z.number().int("availableSlots must be an integer").min(1).max(100),
});

export const createBookingSchema = z.object({
  class_id: z.number().int().positive(),
  client_name: z.string().trim().min(1, "client_name is required").max(100),
  client_email: z.string().trim().email("Invalid email format").max(255),
});

export type CreateClassBody = z.infer<typeof createClassSchema>;
export type CreateBookingBody = z.infer<typeof createBookingSchema>;

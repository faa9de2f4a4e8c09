import type { DeletePolicy } from "../config.js";
import { PlannerDatabase } from "../data/database.js";
import { createPlanner, type Planner } from "../planner.js";

export function memoryPlanner(deletePolicy: DeletePolicy = "cascade"): Planner {
  return createPlanner(PlannerDatabase.inMemory(), { deletePolicy, defaultCurrency: "USD" });
}

/**
 * A small trip: two days, three events, four tasks and two team members.
 * Alice is on the team and holds two tasks; Bob is on the team with one task.
 */
export function seedTrip(planner: Planner) {
  const trip = planner.trips.create({
    title: "Lisbon long weekend",
    destination: "Lisbon",
    startDate: "2026-05-01",
    endDate: "2026-05-03",
  });
  const day1 = planner.days.list(trip.id)[0];
  const day2 = planner.days.add(trip.id);

  const alice = planner.members.create({ name: "Alice", email: "alice@example.test" });
  const bob = planner.members.create({ name: "Bob" });
  planner.members.addToTrip(trip.id, alice.id);
  planner.members.addToTrip(trip.id, bob.id);

  const flight = planner.events.create(day1.id, {
    time: "08:30",
    title: "Flight in",
    category: "transport",
    cost: 120,
  });
  const dinner = planner.events.create(day1.id, {
    time: "20:00",
    title: "Dinner in Alfama",
    category: "food",
    cost: 45.5,
  });
  const tram = planner.events.create(day2.id, {
    time: "10:00",
    title: "Tram 28",
    category: "sightseeing",
    cost: 3,
  });

  const checkIn = planner.tasks.create(flight.id, {
    title: "Online check-in",
    priority: "high",
    dueDate: "2026-04-30",
    assigneeId: alice.id,
  });
  const book = planner.tasks.create(dinner.id, {
    title: "Book a table",
    description: "Fado night, ask for a window seat",
    dueDate: "2026-04-20",
    assigneeId: bob.id,
  });
  const tickets = planner.tasks.create(tram.id, { title: "Buy Viva Viagem card", status: "done" });
  const cash = planner.tasks.create(tram.id, { title: "Withdraw euros", assigneeId: alice.id });

  return { trip, day1, day2, alice, bob, flight, dinner, tram, checkIn, book, tickets, cash };
}

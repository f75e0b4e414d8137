import type { ActivityRecord } from "../services/search/types.js";

/** Activities loaded into a fresh store at startup. */
export const SEED_ACTIVITIES: readonly ActivityRecord[] = [
  {
    name: "Chess Club",
    description: "Learn strategies and compete in chess tournaments",
    schedule: "Fridays, 3:30 PM - 5:00 PM",
    category: "Academic",
    maxParticipants: 12,
    participants: ["michael@lakeside.edu", "daniel@lakeside.edu"],
  },
  {
    name: "Programming Class",
    description: "Learn programming fundamentals and build software projects",
    schedule: "Tuesdays and Thursdays, 3:30 PM - 4:30 PM",
    category: "Academic",
    maxParticipants: 20,
    participants: ["emma@lakeside.edu", "sophia@lakeside.edu"],
  },
  {
    name: "Gym Class",
    description: "Physical education and sports activities",
    schedule: "Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM",
    category: "Sports",
    maxParticipants: 30,
    participants: ["john@lakeside.edu", "olivia@lakeside.edu"],
  },
  {
    name: "Soccer Team",
    description: "Join the school soccer team and compete in matches",
    schedule: "Tuesdays and Thursdays, 4:00 PM - 5:30 PM",
    category: "Sports",
    maxParticipants: 22,
    participants: ["liam@lakeside.edu", "noah@lakeside.edu"],
  },
  {
    name: "Basketball Team",
    description: "Practice and play basketball with the school team",
    schedule: "Wednesdays and Fridays, 3:30 PM - 5:00 PM",
    category: "Sports",
    maxParticipants: 15,
    participants: ["ava@lakeside.edu", "mia@lakeside.edu"],
  },
  {
    name: "Art Club",
    description: "Explore your creativity through painting and drawing",
    schedule: "Thursdays, 3:30 PM - 5:00 PM",
    category: "Arts",
    maxParticipants: 15,
    participants: ["amelia@lakeside.edu", "harper@lakeside.edu"],
  },
  {
    name: "Drama Club",
    description: "Act, direct, and produce plays and performances",
    schedule: "Mondays and Wednesdays, 4:00 PM - 5:30 PM",
    category: "Arts",
    maxParticipants: 20,
    participants: ["ella@lakeside.edu", "scarlett@lakeside.edu"],
  },
  {
    name: "Math Club",
    description: "Solve challenging problems and participate in math competitions",
    schedule: "Tuesdays, 3:30 PM - 4:30 PM",
    category: "Academic",
    maxParticipants: 10,
    participants: ["james@lakeside.edu", "benjamin@lakeside.edu"],
  },
  {
    name: "Debate Team",
    description: "Develop public speaking and argumentation skills",
    schedule: "Fridays, 4:00 PM - 5:30 PM",
    category: "Academic",
    maxParticipants: 12,
    participants: ["charlotte@lakeside.edu", "henry@lakeside.edu"],
  },
  {
    name: "Robotics Workshop",
    description: "Design, build and program robots for regional competitions",
    schedule: "Mondays and Wednesdays, 3:30 PM - 5:00 PM",
    category: "Academic",
    maxParticipants: 25,
    participants: [],
  },
];

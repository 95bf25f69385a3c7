import type { CreateMarkerPersistenceInput, MarkerCategory, MarkerRecord } from '../types/marker';
import type { CreateUserInput, UserRecord, UserRole } from '../types/user';

const PUNE_CENTER = { lat: 18.5204, lng: 73.8567 };
const JITTER_DEGREES = 0.02;

const DEMO_MARKERS: Array<{ locality: string; category: MarkerCategory; contact: string }> = [
  { locality: 'Kothrud', category: 'large', contact: '+91 98765 43210' },
  { locality: 'Shivaji Nagar', category: 'devices', contact: '+91 87654 32109' },
];

// Demo credentials only. Change them before exposing the service.
const DEMO_USERS: Array<{ username: string; password: string; role: UserRole }> = [
  { username: 'admin', password: 'admin123', role: 'admin' },
  { username: 'user', password: 'user123', role: 'user' },
];

export interface SeedMarkersDeps {
  countMarkers: () => Promise<number>;
  createMarker: (input: CreateMarkerPersistenceInput) => Promise<MarkerRecord>;
  now: () => Date;
  random?: () => number;
}

export interface SeedUsersDeps {
  countUsers: () => Promise<number>;
  createUsers: (inputs: CreateUserInput[]) => Promise<UserRecord[]>;
  hashPassword: (password: string) => Promise<string>;
}

export interface SeedSummary {
  markersInserted: number;
  usersInserted: number;
}

/** Uniform offset in [-JITTER_DEGREES, JITTER_DEGREES] from a [0, 1) sample. */
export function jitter(random: () => number): number {
  return (random() * 2 - 1) * JITTER_DEGREES;
}

export async function seedDemoMarkers({
  countMarkers,
  createMarker,
  now,
  random = Math.random,
}: SeedMarkersDeps): Promise<number> {
  if ((await countMarkers()) > 0) {
    return 0;
  }

  for (const demo of DEMO_MARKERS) {
    await createMarker({
      lat: PUNE_CENTER.lat + jitter(random),
      lng: PUNE_CENTER.lng + jitter(random),
      state: 'Maharashtra',
      city: 'Pune',
      locality: demo.locality,
      category: demo.category,
      contact: demo.contact,
      createdAt: now(),
    });
  }

  return DEMO_MARKERS.length;
}

export async function seedDemoUsers({ countUsers, createUsers, hashPassword }: SeedUsersDeps): Promise<number> {
  if ((await countUsers()) > 0) {
    return 0;
  }

  const inputs = await Promise.all(
    DEMO_USERS.map(async (demo) => ({
      username: demo.username,
      passwordHash: await hashPassword(demo.password),
      role: demo.role,
    }))
  );
  const created = await createUsers(inputs);
  return created.length;
}

export async function runSeeders(deps: SeedMarkersDeps & SeedUsersDeps): Promise<SeedSummary> {
  const markersInserted = await seedDemoMarkers(deps);
  if (markersInserted > 0) {
    console.log(`[seed] Inserted ${markersInserted} demo markers in Pune`);
  }

  const usersInserted = await seedDemoUsers(deps);
  if (usersInserted > 0) {
    console.log(`[seed] Inserted default users (${DEMO_USERS.map((demo) => demo.username).join(', ')})`);
  }

  return { markersInserted, usersInserted };
}

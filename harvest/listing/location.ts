export const ANNOUNCED_LATER = "To be announced";

export type Location = {
  room: string | null;
  building: string | null;
  // ambiguous: lowercase building, but not a single drifted letter
  repair: "none" | "announced" | "letter-drift" | "ambiguous";
};

const orNull = (s: string) => (s ? s : null);
const PLACEHOLDER = /^tb[ad](?: tb[ad])?$/;

export function repairLocation(rawRoom: string, rawBuilding: string): Location {
  const room = rawRoom.trim();
  const building = rawBuilding.trim();

  const joined = `${room} ${building}`.replace(/\s+/g, " ").trim().toLowerCase();
  if ((room.toLowerCase() === "to be" && building.toLowerCase().includes("announced")) || joined === "to be announced" || PLACEHOLDER.test(joined)) {
    return { room: null, building: ANNOUNCED_LATER, repair: "announced" };
  }

  // "620 K" + "ravis Hall": the K belongs to the building.
  const drift = /(?:^|\s)([A-Z])$/.exec(room);
  if (drift && /^[a-z]/.test(building)) {
    return {
      room: orNull(room.slice(0, room.length - 1).trimEnd()),
      building: drift[1] + building,
      repair: "letter-drift",
    };
  }

  return {
    room: orNull(room),
    building: orNull(building),
    repair: room && /^[a-z]/.test(building) ? "ambiguous" : "none",
  };
}

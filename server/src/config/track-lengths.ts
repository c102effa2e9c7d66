/**
 * Official circuit lengths in meters, keyed by Grand Prix name.
 * Used to scale a distance axis reconstructed from GPS points.
 */
export const OFFICIAL_TRACK_LENGTHS: Readonly<Record<string, number>> = Object.freeze({
  "Belgium": 7004,
  "Monaco": 3337,
  "Italy": 5793,
  "Bahrain": 5412,
  "Spain": 4675,
  "Austria": 4318,
  "Britain": 5891,
  "Hungary": 4381,
  "Netherlands": 4259,
  "Singapore": 5063,
  "Japan": 5807,
  "Qatar": 5380,
  "United States": 5513,
  "Mexico": 4304,
  "Brazil": 4309,
  "Las Vegas": 6201,
  "Abu Dhabi": 5281,
  "Australia": 5278,
  "Saudi Arabia": 6174,
  "Miami": 5412,
  "Emilia Romagna": 4909,
  "Canada": 4361,
  "Azerbaijan": 6003,
  "China": 5451,
});

/** Case-insensitive lookup; undefined for an unknown circuit */
export function getTrackLength(circuit: string | undefined): number | undefined {
  if (!circuit) return undefined;
  const wanted = circuit.trim().toLowerCase();
  for (const [name, length] of Object.entries(OFFICIAL_TRACK_LENGTHS)) {
    if (name.toLowerCase() === wanted) return length;
  }
  return undefined;
}

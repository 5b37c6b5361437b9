// Gym setups that expand to a list of equipment.
// Maps, not object literals: user-supplied names such as "constructor" must not
// resolve to Object.prototype members.
export const EQUIPMENT_PRESETS: ReadonlyMap<string, readonly string[]> = new Map([
  [
    'full_gym',
    [
      'barbell',
      'dumbbells',
      'cables',
      'machines',
      'bench',
      'rack',
      'pull_up_bar',
      'leg_press_machine',
      'leg_curl_machine',
    ],
  ],
  ['home_basic', ['dumbbells', 'bench', 'resistance_bands', 'pull_up_bar']],
  ['home_advanced', ['barbell', 'dumbbells', 'bench', 'rack', 'cables', 'pull_up_bar']],
  ['bodyweight', ['bodyweight', 'pull_up_bar']],
]);

export const EQUIPMENT_ALIASES: ReadonlyMap<string, string> = new Map([
  ['dumbbell', 'dumbbells'],
  ['cable', 'cables'],
  ['machine', 'machines'],
  ['power_rack', 'rack'],
  ['squat_rack', 'rack'],
  ['pullup_bar', 'pull_up_bar'],
  ['pull-up_bar', 'pull_up_bar'],
  ['barbell_bench', 'bench'],
  ['flat_bench', 'bench'],
  ['incline_bench', 'bench'],
]);

export const BODYWEIGHT = 'bodyweight';

export function canonicalItem(item: string): string {
  const lowered = item.toLowerCase().trim();
  return EQUIPMENT_ALIASES.get(lowered) ?? lowered;
}

/**
 * Expand presets and resolve aliases into a set of canonical equipment names.
 */
export function normalizeEquipment(equipment: readonly string[]): Set<string> {
  const normalized = new Set<string>();
  for (const item of equipment) {
    const lowered = item.toLowerCase().trim();
    if (lowered === '') {
      continue;
    }
    const preset = EQUIPMENT_PRESETS.get(lowered);
    if (preset !== undefined) {
      for (const presetItem of preset) {
        normalized.add(canonicalItem(presetItem));
      }
      continue;
    }
    normalized.add(canonicalItem(lowered));
  }
  return normalized;
}

/**
 * True when every piece of equipment the exercise needs is available.
 * Exercises needing nothing, or only bodyweight, always qualify.
 */
export function isEquipmentSatisfied(
  required: readonly string[],
  available: ReadonlySet<string>
): boolean {
  for (const raw of required) {
    const item = canonicalItem(raw);
    if (item !== '' && item !== BODYWEIGHT && !available.has(item)) {
      return false;
    }
  }
  return true;
}

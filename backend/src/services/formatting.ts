import type { CookingReminder, ShoppingListItem, WeeklyPlanArtifact } from '../types.js';

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

// Format a number as a fraction for display (e.g., 0.5 -> "1/2", 1.333 -> "1 1/3")
export function formatQuantity(num: number | null | undefined): string {
  if (num === null || num === undefined) return '';
  if (num === 0) return '0';

  // Common fractions to recognize (tolerance for floating point)
  const fractions: Array<{ decimal: number; display: string }> = [
    { decimal: 0.125, display: '1/8' },
    { decimal: 0.25, display: '1/4' },
    { decimal: 0.333, display: '1/3' },
    { decimal: 0.5, display: '1/2' },
    { decimal: 0.667, display: '2/3' },
    { decimal: 0.75, display: '3/4' },
  ];

  const whole = Math.floor(num);
  const fractional = num - whole;

  // If it's a whole number
  if (fractional < 0.01) {
    return whole.toString();
  }

  const match = fractions.find(f => Math.abs(fractional - f.decimal) < 0.02);

  // If no match found, round to 1 decimal
  if (!match) {
    return num.toFixed(1).replace(/\.0$/, '');
  }

  return whole === 0 ? match.display : `${whole} ${match.display}`;
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/**
 * "long-grain rice: 2 cup ($1.20)"
 */
export function formatShoppingLine(item: ShoppingListItem): string {
  const cost = item.unitPrice === null ? 'unpriced' : formatMoney(item.estimatedCost);
  return `${item.ingredient}: ${formatQuantity(item.deficit)} ${item.unit} (${cost})`;
}

function dayLabel(dayIndex: number, date: string | null): string {
  if (!date) return `Day ${dayIndex + 1}`;
  const weekday = DAY_NAMES[new Date(`${date}T00:00:00Z`).getUTCDay()];
  return `${weekday} ${date}`;
}

/**
 * Plain-text rendering of a plan for terminals and logs
 */
export function formatPlan(artifact: WeeklyPlanArtifact, reminders: readonly CookingReminder[] = []): string {
  const lines: string[] = [`Weekly plan for ${artifact.profileId}`, ''];

  for (const slot of artifact.slots) {
    const covered = Math.round(slot.pantryAffinity * 100);
    lines.push(`${dayLabel(slot.dayIndex, slot.date)}: ${slot.recipe.title} (${covered}% from pantry)`);
  }

  lines.push('', 'Shopping list:');
  if (artifact.shoppingList.length === 0) {
    lines.push('  (nothing to buy)');
  }
  for (const item of artifact.shoppingList) {
    lines.push(`  - ${formatShoppingLine(item)}`);
  }
  lines.push(`Total: ${formatMoney(artifact.totalCost)}`);

  if (artifact.degradations.length > 0) {
    lines.push('', 'Notes:');
    for (const note of artifact.degradations) {
      lines.push(`  * ${note.message}`);
    }
  }

  if (reminders.length > 0) {
    lines.push('', 'Reminders:');
    for (const reminder of reminders) {
      lines.push(`  ${reminder.startsAt} ${reminder.title}`);
    }
  }

  return lines.join('\n');
}

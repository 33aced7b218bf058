import { NextResponse } from 'next/server';
import { parseIntegerParam, toErrorPayload, type ErrorSource } from '@/lib/api-response';
import {
  assertYear,
  createDefaultFuelModel,
  loadDriverValuesFromScenario,
  previewEscalation,
} from '@/lib/drivers';
import { scenarioRepository } from '@/lib/scenario-repository';

export const dynamic = 'force-dynamic';

/**
 * Escalated price drivers for a target year.
 * Query: baseYear, targetYear, scenarioId? (default drivers without), plantId?
 */
export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const baseYear = parseIntegerParam(searchParams.get('baseYear'));
  const targetYear = parseIntegerParam(searchParams.get('targetYear'));
  const scenarioId = parseIntegerParam(searchParams.get('scenarioId'));
  const plantId = parseIntegerParam(searchParams.get('plantId'));

  if (baseYear === null || targetYear === null) {
    return NextResponse.json(
      { success: false, error: 'Missing or invalid parameters: baseYear, targetYear' },
      { status: 400 }
    );
  }

  let source: ErrorSource = 'client';

  try {
    assertYear(baseYear);
    assertYear(targetYear);

    const baseModel =
      scenarioId === null
        ? createDefaultFuelModel()
        : await loadDriverValuesFromScenario(scenarioRepository, scenarioId, baseYear, plantId);

    source = 'internal';
    const preview = previewEscalation(baseModel, baseYear, targetYear, plantId);
    return NextResponse.json({ success: true, data: { scenarioId, plantId, ...preview } });
  } catch (error) {
    console.error('[API] Escalation preview error:', error);
    const { status, body } = toErrorPayload(error, source);
    return NextResponse.json(body, { status });
  }
}

import { NextResponse } from 'next/server';
import { parseIntegerParam, toErrorPayload } from '@/lib/api-response';
import { compareScenarioDrivers } from '@/lib/drivers';
import { scenarioRepository } from '@/lib/scenario-repository';

export const dynamic = 'force-dynamic';

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const scenarioA = parseIntegerParam(searchParams.get('a'));
  const scenarioB = parseIntegerParam(searchParams.get('b'));
  const year = parseIntegerParam(searchParams.get('year'));

  if (scenarioA === null || scenarioB === null || year === null) {
    return NextResponse.json(
      { success: false, error: 'Missing or invalid parameters: a, b, year' },
      { status: 400 }
    );
  }

  try {
    const comparison = await compareScenarioDrivers(scenarioRepository, scenarioA, scenarioB, year);
    return NextResponse.json({ success: true, data: comparison });
  } catch (error) {
    console.error('[API] Scenario compare error:', error);
    const { status, body } = toErrorPayload(error);
    return NextResponse.json(body, { status });
  }
}

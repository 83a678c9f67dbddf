/**
 * Shared C# sources and skill packs for scanner tests
 */

import { PatternRuleSchema, type PatternRule } from '@/skills/schemas';

export const ORDERS_CONTROLLER = [
  'using Microsoft.AspNetCore.Mvc;',
  '',
  '[Route("api/orders")]',
  'public class OrdersController : ControllerBase',
  '{',
  '    public async Task<IActionResult> Get()',
  '    {',
  '        var data = _service.LoadAsync().Result;',
  '        try',
  '        {',
  '            Save(data);',
  '        }',
  '        catch (Exception) { }',
  '        return Ok(data);',
  '    }',
  '}',
  '',
].join('\n');

export const PROGRAM_CS = [
  'var builder = WebApplication.CreateBuilder(args);',
  'var conn = "Server=db;Database=shop;User Id=sa;Password=test-secret;";',
  'builder.Services.AddCors(o => o.AddPolicy("all", p => p.AllowAnyOrigin()));',
  'var app = builder.Build();',
  'app.UseDeveloperExceptionPage();',
  'app.Run();',
  '',
].join('\n');

/**
 * Skill pack with one marker rule per severity
 */
export const MARKER_PACK = `description: Marker comments used by the tests
rules:
  - id: MARK001
    name: Critical marker
    severity: critical
    pattern: 'CRITICAL_MARKER'
    message: Critical marker found
  - id: MARK002
    name: High marker
    severity: high
    pattern: 'HIGH_MARKER'
    message: High marker found
  - id: MARK003
    name: Medium marker
    severity: medium
    pattern: 'MEDIUM_MARKER'
    message: Medium marker found
`;

/**
 * Three files: one High, nothing, one Critical plus one Medium
 */
export const MARKER_SOURCES: Record<string, string> = {
  'A.cs': 'var x = 1; // HIGH_MARKER\n',
  'B.cs': 'class B { }\n',
  'C.cs': '// CRITICAL_MARKER\n// MEDIUM_MARKER\n',
};

export function patternRule(fields: Record<string, unknown>): PatternRule {
  return PatternRuleSchema.parse(fields);
}

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_TOKEN_MARKERS } from '@otp-relay/domain';

const selectorList = z.array(z.string().min(1));

const codeInputSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('single'), selector: z.string().min(1) }),
  z.object({ mode: z.literal('split'), selectors: selectorList.min(1) })
]);

export const loginFlowSchema = z.object({
  identifierSelectors: selectorList.min(1),
  secretSelectors: selectorList.default([]),
  submitSelectors: selectorList.min(1),
  otpPromptSelector: z.string().min(1),
  otpInput: codeInputSchema,
  otpConfirmSelectors: selectorList.min(1),
  pin: z
    .object({
      stage: z.enum(['before-otp', 'after-otp']),
      input: codeInputSchema,
      submitSelectors: selectorList.min(1)
    })
    .optional(),
  success: z.union([
    z.object({ urlIncludes: z.string().min(1) }),
    z.object({ selector: z.string().min(1) })
  ]),
  callbackUrlIncludes: z.string().min(1).optional(),
  tokenMarkers: selectorList.min(1).default([...DEFAULT_TOKEN_MARKERS])
});

export type LoginFlow = z.infer<typeof loginFlowSchema>;
export type CodeInput = LoginFlow['otpInput'];

export const DEFAULT_LOGIN_FLOW_FILE = fileURLToPath(new URL('../../config/login-flow.json', import.meta.url));

export async function loadLoginFlow(file = DEFAULT_LOGIN_FLOW_FILE): Promise<LoginFlow> {
  const raw = await readFile(file, 'utf8');
  const parsed = loginFlowSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`login_flow_invalid:${file}:${parsed.error.issues.map((issue) => issue.path.join('.')).join(',')}`);
  }
  return parsed.data;
}

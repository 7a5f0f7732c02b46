import { MalformedResponseError } from "../errors";

export const NAME_MARKER = ">> ";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** The name after the last `>> ` in a response */
export function parseNameResponse(
  functionName: string,
  response: string,
  marker = NAME_MARKER
): string {
  const start = response.lastIndexOf(marker);
  if (start === -1) {
    throw new MalformedResponseError(
      functionName,
      response,
      `no "${marker.trim()}" marker`
    );
  }

  const [token = ""] = response
    .slice(start + marker.length)
    .trim()
    .split(/\s+/);
  const name = token.replace(/^[`'"()]+|[`'"()]+$/g, "");

  if (!IDENTIFIER.test(name)) {
    throw new MalformedResponseError(
      functionName,
      response,
      `"${name}" is not a valid name`
    );
  }
  return name;
}

/** The code in a response, unwrapped from its ``` fence if it has one */
export function parseCodeResponse(
  functionName: string,
  response: string
): string {
  const fence = response.indexOf("```");
  if (fence === -1) return response;

  const lineEnd = response.indexOf("\n", fence);
  if (lineEnd === -1) {
    throw new MalformedResponseError(
      functionName,
      response,
      "nothing after the opening fence"
    );
  }
  const end = response.indexOf("```", lineEnd);
  if (end === -1) {
    throw new MalformedResponseError(
      functionName,
      response,
      "unterminated code fence"
    );
  }
  return response.slice(lineEnd + 1, end);
}

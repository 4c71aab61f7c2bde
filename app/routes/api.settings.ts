import type { RouteArgs } from "~/.server/http/route";
import { errorResponse, methodNotAllowed, readJsonBody } from "~/.server/http/route";
import { loadSettings, updateSettings } from "~/.server/config/storage";
import { redactSettings, SettingsUpdateSchema } from "~/.server/config/settings";
import { getLogger, getLogLevel, setLogLevel } from "~/.server/log/logger";

const log = getLogger({ module: "ApiSettings" });

export async function loader(_args: RouteArgs) {
  try {
    const settings = await loadSettings();
    return Response.json(redactSettings(settings));
  } catch (error) {
    return errorResponse(error, log, "Failed to load settings");
  }
}

export async function action({ request }: RouteArgs) {
  if (request.method !== "PUT") {
    return methodNotAllowed(request);
  }

  try {
    const updates = SettingsUpdateSchema.parse(await readJsonBody(request));
    const settings = await updateSettings(updates);

    const level = settings.preferences.logLevel;
    if (updates.preferences?.logLevel && level !== getLogLevel()) {
      log.info({ from: getLogLevel(), to: level }, "log level changed");
      setLogLevel(level);
    }

    return Response.json(redactSettings(settings));
  } catch (error) {
    return errorResponse(error, log, "Failed to update settings");
  }
}

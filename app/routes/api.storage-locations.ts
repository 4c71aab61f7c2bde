import { z } from "zod";
import type { RouteArgs } from "~/.server/http/route";
import { errorResponse, methodNotAllowed, readJsonBody } from "~/.server/http/route";
import { getDbClient } from "~/.server/db/client";
import { StorageLocationRepository } from "~/.server/db/storage-locations";
import { STORAGE_TYPES } from "~/types/storage-location";
import { getLogger } from "~/.server/log/logger";

const log = getLogger({ module: "ApiStorageLocations" });

const CreateLocationSchema = z.object({
  name: z.string().trim().min(1, "Name is required"),
  type: z.enum(STORAGE_TYPES),
  path: z.string().trim().min(1, "Path is required"),
  isEnabled: z.boolean().optional(),
});

export async function loader(_args: RouteArgs) {
  try {
    const locations = new StorageLocationRepository(getDbClient()).list();
    return Response.json({ locations });
  } catch (error) {
    return errorResponse(error, log, "Failed to list storage locations");
  }
}

export async function action({ request }: RouteArgs) {
  if (request.method !== "POST") {
    return methodNotAllowed(request);
  }

  try {
    const input = CreateLocationSchema.parse(await readJsonBody(request));
    const location = new StorageLocationRepository(getDbClient()).create(input);

    log.info({ id: location.id, type: location.type }, "storage location created");
    return Response.json(location, { status: 201 });
  } catch (error) {
    return errorResponse(error, log, "Failed to create storage location");
  }
}

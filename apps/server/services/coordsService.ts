import {
  calculateBearing,
  calculateDistance,
  detectCoordinateFormat,
  formatCoordinate,
  parseCoordinate,
  projectWaypoint,
  UNIT_LABELS,
  type Coordinate,
  type CoordinateFormat,
  type DistanceUnit,
} from "@utils";
import type { CoordsRequest } from "@shared/schema";

export type CoordsResult =
  | { mode: "convert"; result: string; input_format: CoordinateFormat; coordinate: Coordinate }
  | { mode: "distance"; result: number; unit: DistanceUnit; summary: string }
  | { mode: "bearing"; result: number }
  | { mode: "project"; result: string; coordinate: Coordinate };

export function runCoords(request: CoordsRequest): CoordsResult {
  switch (request.mode) {
    case "convert": {
      const coordinate = parseCoordinate(request.coordinate);
      return {
        mode: request.mode,
        result: formatCoordinate(coordinate, request.format),
        input_format: detectCoordinateFormat(request.coordinate),
        coordinate,
      };
    }
    case "distance": {
      const { value, unit } = calculateDistance(
        parseCoordinate(request.from),
        parseCoordinate(request.to),
        request.unit
      );
      return {
        mode: request.mode,
        result: value,
        unit,
        summary: `Distance: ${value.toFixed(2)} ${UNIT_LABELS[unit]}`,
      };
    }
    case "bearing":
      return {
        mode: request.mode,
        result: calculateBearing(parseCoordinate(request.from), parseCoordinate(request.to)),
      };
    case "project": {
      const coordinate = projectWaypoint(
        parseCoordinate(request.origin),
        request.distance,
        request.bearing,
        request.unit
      );
      return { mode: request.mode, result: formatCoordinate(coordinate, request.format), coordinate };
    }
  }
}

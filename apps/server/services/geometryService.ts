import {
  calculateBoundingBox,
  calculateCentroid,
  calculateCircumcenter,
  calculateCircumradius,
  calculateMidpoint,
  calculateOrthocenter,
  calculateTriangleArea,
  formatCoordinate,
  isPointInPolygon,
  parseCoordinate,
  type AreaUnit,
  type BoundingBox,
  type Coordinate,
  type DistanceUnit,
  type GeometrySettings,
  type Measurement,
} from "@utils";
import type { GeometryRequest } from "@shared/schema";

export type GeometryResult =
  | { mode: "circumcenter"; result: string; coordinate: Coordinate; radius?: Measurement<DistanceUnit> }
  | { mode: "orthocenter" | "midpoint" | "centroid"; result: string; coordinate: Coordinate }
  | { mode: "triangle-area"; result: number; unit: AreaUnit }
  | { mode: "bounding-box"; result: { min: string; max: string }; box: BoundingBox }
  | { mode: "point-in-polygon"; result: boolean };

function parseTriangle(points: string[]): [Coordinate, Coordinate, Coordinate] {
  const [a, b, c] = points.map(parseCoordinate);
  return [a, b, c];
}

export function runGeometry(request: GeometryRequest, settings: GeometrySettings): GeometryResult {
  switch (request.mode) {
    case "circumcenter": {
      const [a, b, c] = parseTriangle(request.points);
      const coordinate = calculateCircumcenter(a, b, c);
      return {
        mode: request.mode,
        result: formatCoordinate(coordinate, request.format),
        coordinate,
        radius: request.radius ? calculateCircumradius(a, b, c, request.unit) : undefined,
      };
    }
    case "orthocenter": {
      const coordinate = calculateOrthocenter(...parseTriangle(request.points));
      return { mode: request.mode, result: formatCoordinate(coordinate, request.format), coordinate };
    }
    case "triangle-area": {
      const { value, unit } = calculateTriangleArea(...parseTriangle(request.points), request.unit);
      return { mode: request.mode, result: value, unit };
    }
    case "midpoint": {
      const [a, b] = request.points.map(parseCoordinate);
      const coordinate = calculateMidpoint(a, b);
      return { mode: request.mode, result: formatCoordinate(coordinate, request.format), coordinate };
    }
    case "centroid": {
      const coordinate = calculateCentroid(request.points.map(parseCoordinate), settings);
      return { mode: request.mode, result: formatCoordinate(coordinate, request.format), coordinate };
    }
    case "bounding-box": {
      const box = calculateBoundingBox(request.points.map(parseCoordinate), settings);
      return {
        mode: request.mode,
        result: {
          min: formatCoordinate({ lat: box.min_lat, lon: box.min_lon }, request.format),
          max: formatCoordinate({ lat: box.max_lat, lon: box.max_lon }, request.format),
        },
        box,
      };
    }
    case "point-in-polygon":
      return {
        mode: request.mode,
        result: isPointInPolygon(
          parseCoordinate(request.point),
          request.polygon.map(parseCoordinate),
          settings
        ),
      };
  }
}

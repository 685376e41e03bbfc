/**
 * Store schema
 *
 * Location types are stored denormalised on every entity (code and
 * description) so the serving side never joins the code tables for display.
 * Both R-tree tables are keyed by location code.
 */

/** Bumped whenever the table layout changes */
export const STORE_FORMAT_VERSION = 1;

export const STORE_DDL = `
  CREATE TABLE metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE statistics (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL            -- JSON
  );

  CREATE TABLE countries (
    cid INTEGER PRIMARY KEY,
    ecc TEXT,
    ccd TEXT,
    name TEXT NOT NULL
  );

  CREATE TABLE location_types (
    class TEXT NOT NULL,
    tcd INTEGER NOT NULL,
    stcd INTEGER,                  -- NULL for type rows
    description TEXT,
    national_code TEXT,
    national_description TEXT
  );

  CREATE TABLE names (
    cid INTEGER NOT NULL,
    lid INTEGER NOT NULL,
    nid INTEGER NOT NULL,
    name TEXT NOT NULL,
    comment TEXT,
    official_name TEXT,
    PRIMARY KEY (lid, nid)
  );

  CREATE TABLE administrative_areas (
    lcd INTEGER PRIMARY KEY,
    cid INTEGER NOT NULL,
    tabcd INTEGER NOT NULL,
    type_code TEXT NOT NULL,
    type_description TEXT,
    name TEXT,
    parent_lcd INTEGER
  );

  CREATE TABLE other_areas (
    lcd INTEGER PRIMARY KEY,
    cid INTEGER NOT NULL,
    tabcd INTEGER NOT NULL,
    type_code TEXT NOT NULL,
    type_description TEXT,
    name TEXT,
    parent_lcd INTEGER
  );

  CREATE TABLE roads (
    lcd INTEGER PRIMARY KEY,
    cid INTEGER NOT NULL,
    tabcd INTEGER NOT NULL,
    type_code TEXT NOT NULL,
    type_description TEXT,
    road_number TEXT,
    classification TEXT NOT NULL,
    name TEXT,
    start_name TEXT,
    end_name TEXT,
    administrative_area_lcd INTEGER,
    network_level TEXT,
    rdid TEXT,
    min_lon REAL,                  -- extent of the road's points, NULL without points
    min_lat REAL,
    max_lon REAL,
    max_lat REAL
  );

  CREATE TABLE segments (
    lcd INTEGER PRIMARY KEY,
    cid INTEGER NOT NULL,
    tabcd INTEGER NOT NULL,
    type_code TEXT NOT NULL,
    type_description TEXT,
    road_number TEXT,
    name TEXT,
    start_name TEXT,
    end_name TEXT,
    road_lcd INTEGER,
    parent_segment_lcd INTEGER,
    administrative_area_lcd INTEGER,
    negative_offset_lcd INTEGER,
    positive_offset_lcd INTEGER
  );

  CREATE TABLE points (
    lcd INTEGER PRIMARY KEY,
    cid INTEGER NOT NULL,
    tabcd INTEGER NOT NULL,
    type_code TEXT NOT NULL,
    type_description TEXT,
    category TEXT NOT NULL,
    junction_number TEXT,
    name TEXT,
    secondary_name TEXT,
    road_name TEXT,
    road_lcd INTEGER,
    segment_lcd INTEGER,
    administrative_area_lcd INTEGER,
    other_area_lcd INTEGER,
    urban INTEGER,
    interrupts_road TEXT,
    in_pos INTEGER,
    in_neg INTEGER,
    out_pos INTEGER,
    out_neg INTEGER,
    present_pos INTEGER,
    present_neg INTEGER,
    negative_offset_lcd INTEGER,
    positive_offset_lcd INTEGER,
    easting REAL NOT NULL,
    northing REAL NOT NULL,
    lon REAL NOT NULL,
    lat REAL NOT NULL,
    out_of_envelope INTEGER NOT NULL
  );

  CREATE TABLE intersections (
    lcd INTEGER PRIMARY KEY,
    type TEXT NOT NULL
  );

  CREATE TABLE intersection_points (
    intersection_lcd INTEGER NOT NULL,
    point_lcd INTEGER NOT NULL,
    PRIMARY KEY (intersection_lcd, point_lcd)
  );

  CREATE TABLE intersection_roads (
    intersection_lcd INTEGER NOT NULL,
    road_lcd INTEGER NOT NULL,
    PRIMARY KEY (intersection_lcd, road_lcd)
  );

  CREATE VIRTUAL TABLE points_rtree USING rtree(
    id,
    min_lon,
    max_lon,
    min_lat,
    max_lat
  );

  CREATE VIRTUAL TABLE roads_rtree USING rtree(
    id,
    min_lon,
    max_lon,
    min_lat,
    max_lat
  );
`;

export const STORE_INDEXES = `
  CREATE INDEX idx_roads_road_number ON roads(road_number);
  CREATE INDEX idx_roads_classification ON roads(classification);
  CREATE INDEX idx_roads_name ON roads(name);
  CREATE INDEX idx_segments_road ON segments(road_lcd);
  CREATE INDEX idx_points_type ON points(type_code);
  CREATE INDEX idx_points_road ON points(road_lcd);
  CREATE INDEX idx_points_name ON points(name);
`;

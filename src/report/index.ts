export {
  buildShapeRows,
  formatShapeTable,
  renderShapeTable,
  SHAPE_TABLE_COLUMNS,
  type ShapeRow,
} from './ShapeTable.js';

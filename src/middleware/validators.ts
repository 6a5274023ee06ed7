import { body, param, query } from 'express-validator';
import {
  ACTION_PRIORITIES,
  ACTION_STATUSES,
  ASSET_CATEGORIES,
  ASSET_TYPES,
  AUDIT_ACTIONS,
  COMPLIANCE_STATUSES,
  FRAMEWORKS,
  RISK_STATUSES,
} from '../constants/enums.js';
import { RISK_BANDS } from '../services/riskScoring.service.js';

const ISO_DATE = { format: 'YYYY-MM-DD', strictMode: true, delimiters: ['-'] };

// Common validators
export const idParam = (field: string = 'id') =>
  param(field).isInt({ min: 1 }).toInt().withMessage(`${field} must be a positive integer`);

export const frameworkParam = param('framework')
  .isIn(FRAMEWORKS)
  .withMessage(`framework must be one of: ${FRAMEWORKS.join(', ')}`);

export const paginationQuery = [
  query('limit').optional().isInt({ min: 1 }).toInt().withMessage('Limit must be a positive integer'),
  query('offset').optional().isInt({ min: 0 }).toInt().withMessage('Offset must be zero or more'),
];

const rating = (field: string) =>
  body(field).isInt({ min: 1, max: 5 }).toInt().withMessage(`${field} must be an integer between 1 and 5`);

const optionalRating = (field: string) =>
  body(field)
    .optional({ values: 'null' })
    .isInt({ min: 1, max: 5 })
    .toInt()
    .withMessage(`${field} must be an integer between 1 and 5`);

const optionalRef = (field: string) =>
  body(field).optional({ values: 'null' }).isInt({ min: 1 }).toInt().withMessage(`${field} must be a positive integer`);

const idList = (field: string) => [
  body(field).optional().isArray().withMessage(`${field} must be an array`),
  body(`${field}.*`).isInt({ min: 1 }).toInt().withMessage(`${field} entries must be positive integers`),
];

const optionalDate = (field: string) =>
  body(field).optional({ values: 'null' }).isDate(ISO_DATE).withMessage(`${field} must be a date (YYYY-MM-DD)`);

const text = (field: string, max: number) =>
  body(field)
    .optional({ values: 'null' })
    .isString()
    .trim()
    .isLength({ max })
    .withMessage(`${field} must be less than ${max} characters`);

// Project validators
export const createProjectValidator = [
  body('name').isString().trim().isLength({ min: 1, max: 200 }).withMessage('Project name is required'),
];

// Risk validators
export const listRisksValidator = [
  query('projectId').optional().isInt({ min: 1 }).toInt().withMessage('projectId must be a positive integer'),
  query('status').optional().isIn(RISK_STATUSES).withMessage('Invalid risk status'),
  query('band').optional().isIn(RISK_BANDS).withMessage('Invalid risk band'),
];

export const matrixQuery = [
  query('projectId').optional().isInt({ min: 1 }).toInt().withMessage('projectId must be a positive integer'),
  query('view').optional().isIn(['current', 'target']).withMessage('view must be current or target'),
];

export const riskExportQuery = [
  query('format').optional().isIn(['csv', 'json']).withMessage('format must be csv or json'),
];

export const createRiskValidator = [
  body('title')
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Risk title is required and must be less than 200 characters'),
  text('description', 2000),
  optionalRef('projectId'),
  optionalRef('ownerId'),
  rating('likelihood'),
  rating('consequence'),
  optionalRating('targetLikelihood'),
  optionalRating('targetConsequence'),
  body('status').optional().isIn(RISK_STATUSES).withMessage('Invalid risk status'),
  ...idList('nsmPrincipleIds'),
  ...idList('ekomPrincipleIds'),
  ...idList('assetIds'),
];

export const updateRiskValidator = [
  body('title')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Risk title must be between 1 and 200 characters'),
  text('description', 2000),
  optionalRef('projectId'),
  optionalRef('ownerId'),
  rating('likelihood').optional(),
  rating('consequence').optional(),
  optionalRating('targetLikelihood'),
  optionalRating('targetConsequence'),
  body('status').optional().isIn(RISK_STATUSES).withMessage('Invalid risk status'),
  ...idList('nsmPrincipleIds'),
  ...idList('ekomPrincipleIds'),
  ...idList('assetIds'),
];

export const acceptRiskValidator = [
  body('rationale').isString().trim().isLength({ min: 1, max: 2000 }).withMessage('Acceptance rationale is required'),
  optionalDate('validUntil'),
];

// Action validators
export const listActionsValidator = [
  query('status').optional().isIn(ACTION_STATUSES).withMessage('Invalid action status'),
  query('riskId').optional().isInt({ min: 1 }).toInt().withMessage('riskId must be a positive integer'),
];

export const createActionValidator = [
  body('title')
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Action title is required and must be less than 200 characters'),
  text('description', 2000),
  body('status').optional().isIn(ACTION_STATUSES).withMessage('Invalid action status'),
  body('priority').optional().isIn(ACTION_PRIORITIES).withMessage('Invalid action priority'),
  optionalRef('ownerId'),
  optionalDate('dueDate'),
  ...idList('riskIds'),
];

export const updateActionValidator = [
  body('title')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Action title must be between 1 and 200 characters'),
  ...createActionValidator.slice(1),
];

export const actionStatusValidator = [
  body('status').isIn(ACTION_STATUSES).withMessage('Invalid action status'),
];

// Supplier validators
export const createSupplierValidator = [
  body('name')
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Supplier name is required and must be less than 200 characters'),
  body('criticality').isInt({ min: 1, max: 5 }).toInt().withMessage('Criticality must be between 1 and 5'),
  optionalDate('contractEndDate'),
  optionalDate('lastAssessedAt'),
  body('isExternal').optional().isBoolean({ strict: true }).withMessage('isExternal must be a boolean'),
];

export const updateSupplierValidator = [
  body('name')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Supplier name must be between 1 and 200 characters'),
  body('criticality').optional().isInt({ min: 1, max: 5 }).toInt().withMessage('Criticality must be between 1 and 5'),
  ...createSupplierValidator.slice(2),
];

export const assessmentValidator = [optionalDate('assessedOn')];

// Asset validators
export const createAssetValidator = [
  body('name')
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Asset name is required and must be less than 200 characters'),
  body('assetType').isIn(ASSET_TYPES).withMessage(`assetType must be one of: ${ASSET_TYPES.join(', ')}`),
  body('category')
    .optional()
    .isIn(ASSET_CATEGORIES)
    .withMessage(`category must be one of: ${ASSET_CATEGORIES.join(', ')}`),
  body('criticality').optional().isInt({ min: 1, max: 5 }).toInt().withMessage('Criticality must be between 1 and 5'),
  text('description', 2000),
  text('location', 200),
  optionalRef('parentId'),
  body('isManual').optional().isBoolean({ strict: true }).withMessage('isManual must be a boolean'),
];

export const updateAssetValidator = [
  body('name')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Asset name must be between 1 and 200 characters'),
  body('assetType')
    .optional()
    .isIn(ASSET_TYPES)
    .withMessage(`assetType must be one of: ${ASSET_TYPES.join(', ')}`),
  ...createAssetValidator.slice(2),
];

// Review validators
export const createReviewValidator = [
  body('title')
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Review title is required and must be less than 200 characters'),
  body('scheduledDate').isDate(ISO_DATE).withMessage('scheduledDate must be a date (YYYY-MM-DD)'),
  text('notes', 5000),
];

export const completeReviewValidator = [optionalDate('conductedDate'), text('notes', 5000)];

// Compliance validators
export const coverageQuery = [
  query('mode').optional().isIn(['active', 'all']).withMessage('mode must be active or all'),
  query('projectId').optional().isInt({ min: 1 }).toInt().withMessage('projectId must be a positive integer'),
  query('asOf').optional().isDate(ISO_DATE).withMessage('asOf must be a date (YYYY-MM-DD)'),
];

export const principlesQuery = [
  query('activeOnly').optional().isBoolean().toBoolean().withMessage('activeOnly must be true or false'),
  query('asOf').optional().isDate(ISO_DATE).withMessage('asOf must be a date (YYYY-MM-DD)'),
];

export const createMappingValidator = [
  body('riskId').isInt({ min: 1 }).toInt().withMessage('riskId must be a positive integer'),
  body('principleId').isInt({ min: 1 }).toInt().withMessage('principleId must be a positive integer'),
  body('complianceStatus')
    .optional({ values: 'null' })
    .isIn(COMPLIANCE_STATUSES)
    .withMessage('Invalid compliance status'),
  text('notes', 2000),
];

export const updateMappingValidator = createMappingValidator.slice(2);

export const createActionMappingValidator = [
  body('actionId').isInt({ min: 1 }).toInt().withMessage('actionId must be a positive integer'),
  body('principleId').isInt({ min: 1 }).toInt().withMessage('principleId must be a positive integer'),
  text('notes', 2000),
];

// Audit validators
export const auditRecentQuery = [
  ...paginationQuery,
  query('action').optional().isIn(AUDIT_ACTIONS).withMessage('Invalid audit action'),
  query('entityType').optional().isString().trim().notEmpty().withMessage('entityType must not be empty'),
];

// Dashboard validators
export const alertsQuery = ['includeInfo', 'includeWarning', 'includeDanger'].map((field) =>
  query(field).optional().isBoolean().toBoolean().withMessage(`${field} must be true or false`),
);

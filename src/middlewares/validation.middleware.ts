// src/middlewares/validation.middleware.ts
import { RequestHandler } from 'express';
import { isObjectIdOrHexString } from 'mongoose';
import { ValidationError as RequestValidationError, body, query, validationResult } from 'express-validator';

/**
 * Route param must be a 24-hex ObjectId
 */
export const validateObjectId =
  (paramName: string): RequestHandler =>
  (req, res, next) => {
    const id = req.params[paramName];

    if (!id || !isObjectIdOrHexString(id)) {
      res.status(400).json({
        success: false,
        message: id ? `Invalid ${paramName} format` : `${paramName} is required`
      });
      return;
    }

    next();
  };

const fieldErrors = validationResult.withDefaults({
  formatter: (error: RequestValidationError) => ({
    field: error.type === 'field' ? error.path : error.type,
    message: String(error.msg)
  })
});

/**
 * Ends the chain with 400 and every { field, message } collected so far
 */
export const handleValidationErrors: RequestHandler = (req, res, next) => {
  const errors = fieldErrors(req);

  if (!errors.isEmpty()) {
    res.status(400).json({ success: false, message: 'Validation failed', errors: errors.array() });
    return;
  }

  next();
};

/**
 * Common validation rules for user registration
 */
export const validateUserRegistration = [
  body('username')
    .isString()
    .trim()
    .isLength({ min: 3, max: 30 })
    .withMessage('Username must be between 3 and 30 characters')
    .matches(/^[a-zA-Z0-9_]+$/)
    .withMessage('Username can only contain letters, numbers, and underscores'),

  body('email')
    .isEmail()
    .withMessage('Please provide a valid email')
    .normalizeEmail(),

  body('password')
    .isString()
    .isLength({ min: 6 })
    .withMessage('Password must be at least 6 characters long'),

  body('firstName')
    .optional()
    .isString()
    .trim()
    .isLength({ max: 50 })
    .withMessage('First name must be less than 50 characters'),

  body('lastName')
    .optional()
    .isString()
    .trim()
    .isLength({ max: 50 })
    .withMessage('Last name must be less than 50 characters'),

  handleValidationErrors
];

/**
 * Common validation rules for user login
 */
export const validateUserLogin = [
  body('email')
    .isEmail()
    .withMessage('Please provide a valid email')
    .normalizeEmail(),

  body('password')
    .isString()
    .notEmpty()
    .withMessage('Password is required'),

  handleValidationErrors
];

/**
 * Validation for sending a message
 */
export const validateMessageCreation = [
  body('receiverId')
    .isMongoId()
    .withMessage('A valid receiverId is required'),

  body('content')
    .isString()
    .withMessage('Message content is required')
    .trim()
    .notEmpty()
    .withMessage('Message content cannot be empty')
    .isLength({ max: 4000 })
    .withMessage('Message cannot exceed 4000 characters'),

  body('parentMessageId')
    .optional({ values: 'null' })
    .isMongoId()
    .withMessage('parentMessageId must be a valid id'),

  handleValidationErrors
];

/**
 * Validation for editing a message
 */
export const validateMessageEdit = [
  body('content')
    .isString()
    .withMessage('Message content is required')
    .trim()
    .notEmpty()
    .withMessage('Message content cannot be empty')
    .isLength({ max: 4000 })
    .withMessage('Message cannot exceed 4000 characters'),

  handleValidationErrors
];

/**
 * Validation for marking messages read; without ids, or with none, every unread message is marked
 */
export const validateMarkRead = [
  body('ids')
    .optional()
    .isArray()
    .withMessage('ids must be an array of message ids'),

  body('ids.*')
    .isMongoId()
    .withMessage('Each id must be a valid message id'),

  handleValidationErrors
];

export const validateNotificationQuery = [
  query('unreadOnly')
    .optional()
    .isIn(['true', 'false'])
    .withMessage('unreadOnly must be true or false'),

  handleValidationErrors
];

export const validateSystemNotification = [
  body('title')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Title must be between 1 and 200 characters'),

  body('content')
    .optional()
    .isString()
    .trim()
    .notEmpty()
    .withMessage('Content cannot be empty'),

  handleValidationErrors
];

/**
 * Validation for account deletion
 */
export const validateAccountDeletion = [
  body('confirm')
    .isBoolean({ strict: true })
    .withMessage('confirm must be a boolean'),

  body('password')
    .optional()
    .isString()
    .withMessage('password must be a string'),

  handleValidationErrors
];

export const STORE_QUERIES = {
  INSERT_REQUEST: `
    INSERT INTO purchase_requests (
      id, title, description, requester_id,
      total_amount, status, source, proforma,
      version, created_at, updated_at
    ) VALUES (
      $1, $2, $3, $4,
      $5, $6, $7, $8,
      $9, $10, $11
    )
  `,

  INSERT_ITEM: `
    INSERT INTO request_items (request_id, line_number, description, quantity, unit_price, line_total)
    VALUES ($1, $2, $3, $4, $5, $6)
  `,

  DELETE_ITEMS: `
    DELETE FROM request_items WHERE request_id = $1
  `,

  GET_REQUEST: `
    SELECT * FROM purchase_requests WHERE id = $1
  `,

  GET_REQUEST_FOR_UPDATE: `
    SELECT * FROM purchase_requests WHERE id = $1 FOR UPDATE
  `,

  GET_ITEMS: `
    SELECT * FROM request_items WHERE request_id = $1 ORDER BY line_number
  `,

  GET_ITEMS_FOR_REQUESTS: `
    SELECT * FROM request_items WHERE request_id = ANY($1) ORDER BY request_id, line_number
  `,

  LIST_REQUESTS: `
    SELECT * FROM purchase_requests
    WHERE ($1::text IS NULL OR status = $1)
      AND ($2::text IS NULL OR requester_id = $2)
    ORDER BY created_at DESC
  `,

  UPDATE_ITEMS_TOTAL: `
    UPDATE purchase_requests
    SET total_amount = $3, version = version + 1, updated_at = $4
    WHERE id = $1 AND version = $2
    RETURNING *
  `,

  UPDATE_STATUS: `
    UPDATE purchase_requests
    SET status = $3,
        approved_at = COALESCE($4, approved_at),
        rejected_at = COALESCE($5, rejected_at),
        version = version + 1,
        updated_at = $6
    WHERE id = $1 AND version = $2
    RETURNING *
  `,

  DELETE_REQUEST: `
    DELETE FROM purchase_requests WHERE id = $1
  `,

  INSERT_APPROVAL: `
    INSERT INTO approvals (id, request_id, level, decider_id, decision, comment, decided_at)
    VALUES ($1, $2, $3, $4, $5, $6, $7)
    RETURNING *
  `,

  GET_APPROVALS: `
    SELECT * FROM approvals WHERE request_id = $1 ORDER BY level
  `,

  NEXT_PO_SEQUENCE: `
    SELECT nextval('purchase_order_seq') AS value
  `,

  INSERT_PO: `
    INSERT INTO purchase_orders (
      id, request_id, po_number, sequence,
      requester_id, level_1_approver_id, level_2_approver_id,
      total_amount, document_ref, generated_at
    ) VALUES (
      $1, $2, $3, $4,
      $5, $6, $7,
      $8, $9, $10
    )
  `,

  INSERT_PO_LINE: `
    INSERT INTO purchase_order_lines (po_id, line_number, description, quantity, unit_price, line_total)
    VALUES ($1, $2, $3, $4, $5, $6)
  `,

  GET_PO: `
    SELECT * FROM purchase_orders WHERE id = $1
  `,

  GET_PO_BY_REQUEST: `
    SELECT * FROM purchase_orders WHERE request_id = $1
  `,

  GET_PO_LINES: `
    SELECT * FROM purchase_order_lines WHERE po_id = $1 ORDER BY line_number
  `,
} as const;

export const APPROVAL_LEVEL_CONSTRAINT = 'approvals_request_level_key';
export const PO_REQUEST_CONSTRAINT = 'purchase_orders_request_id_key';

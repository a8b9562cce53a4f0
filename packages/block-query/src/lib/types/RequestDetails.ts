// SPDX-License-Identifier: Apache-2.0

import { formatRequestIdMessage } from '../../formatters';

/**
 * Interface representing the details of a request.
 */
export interface IRequestDetails {
  /**
   * The unique identifier for the request.
   */
  requestId: string;
}

/**
 * Represents the details of a request.
 */
export class RequestDetails {
  /**
   * The unique identifier for the request.
   */
  requestId: string;

  /**
   * Creates an instance of RequestDetails.
   * @param {IRequestDetails} details - The details of the request.
   */
  constructor(details: IRequestDetails) {
    this.requestId = details.requestId;
  }

  /**
   * Gets the formatted request ID message.
   * @returns {string} The formatted request ID message.
   */
  get formattedRequestId(): string {
    return formatRequestIdMessage(this.requestId);
  }
}
